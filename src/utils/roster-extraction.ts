/**
 * Roster Extraction Utilities
 *
 * Builds the team table and the player master table from the bootstrap
 * payload.
 */

import { RawPlayer, RawTeam } from '../models/fpl-api';
import { PlayerMasterRow, mapPosition } from '../models/player';
import { TeamRow, mapTeam } from '../models/team';
import { roundStat, toNumberOrNull, toNumberOrZero, toTextOrNull } from './coercion';

/**
 * Player master extraction result
 */
export interface PlayerExtraction {
  players: PlayerMasterRow[];
  skipped: RawPlayer[];          // Records without a display name or price
}

/**
 * Extract teams, one row per club
 */
export function extractTeams(teams: readonly RawTeam[]): TeamRow[] {
  return teams.map(mapTeam);
}

/**
 * Extract the player master table
 *
 * Players without a display name or a price are skipped; they are still
 * part of the snapshot and the gameweek stats.
 */
export function extractPlayers(players: readonly RawPlayer[], teams: readonly RawTeam[]): PlayerExtraction {
  const teamsById = new Map<number, RawTeam>();
  for (const team of teams) {
    teamsById.set(team.id, team);
  }

  const extraction: PlayerExtraction = { players: [], skipped: [] };

  for (const player of players) {
    const webName = toTextOrNull(player.web_name);
    const nowCost = toNumberOrNull(player.now_cost);

    if (!webName || nowCost === null) {
      extraction.skipped.push(player);
      continue;
    }

    const teamId = toNumberOrNull(player.team);
    const team = teamId === null ? undefined : teamsById.get(teamId);

    extraction.players.push({
      fpl_id: player.id,
      name: webName,
      full_name: `${player.first_name ?? ''} ${player.second_name ?? ''}`.trim(),
      team_name: team?.name ?? 'Unknown',
      team_short: team?.short_name ?? 'UNK',
      team_fpl_code: teamId,
      position: mapPosition(toNumberOrNull(player.element_type)),
      price: roundStat(nowCost / 10),
      status: toTextOrNull(player.status),
      selected_by_percent: toNumberOrNull(player.selected_by_percent),
      form: toNumberOrNull(player.form),
      total_points: toNumberOrZero(player.total_points),
      minutes: toNumberOrZero(player.minutes),
    });
  }

  return extraction;
}
