/**
 * Team Models
 *
 * Roster table written to teams.csv, one row per club.
 */

import { RawTeam } from './fpl-api';

/**
 * Team row as persisted
 */
export interface TeamRow {
  fpl_code: number;              // Club id in the fantasy API
  name: string;                  // Full club name
  short_name: string;            // Three-letter abbreviation (e.g., "ARS")
}

/**
 * CSV column order for teams.csv
 */
export const TEAM_COLUMNS: readonly (keyof TeamRow)[] = ['fpl_code', 'name', 'short_name'];

/**
 * Convert API team to TeamRow
 */
export function mapTeam(team: RawTeam): TeamRow {
  return {
    fpl_code: team.id,
    name: team.name,
    short_name: team.short_name,
  };
}
