/**
 * Roster Extraction Tests
 */

import { extractPlayers, extractTeams } from '../../src/utils/roster-extraction';
import { Position, mapPosition } from '../../src/models/player';
import { RawTeam } from '../../src/models/fpl-api';
import { makeRawPlayer } from '../helpers/fixtures';

const teams: RawTeam[] = [
  { id: 1, name: 'Arsenal', short_name: 'ARS', code: 3 },
  { id: 2, name: 'Aston Villa', short_name: 'AVL', code: 7 },
];

describe('extractTeams', () => {
  it('should map each club to a team row', () => {
    expect(extractTeams(teams)).toEqual([
      { fpl_code: 1, name: 'Arsenal', short_name: 'ARS' },
      { fpl_code: 2, name: 'Aston Villa', short_name: 'AVL' },
    ]);
  });
});

describe('mapPosition', () => {
  it('should map element types to positions', () => {
    expect(mapPosition(1)).toBe(Position.GK);
    expect(mapPosition(2)).toBe(Position.DEF);
    expect(mapPosition(3)).toBe(Position.MID);
    expect(mapPosition(4)).toBe(Position.FWD);
  });

  it('should map unknown element types to UNK', () => {
    expect(mapPosition(5)).toBe(Position.UNKNOWN);
    expect(mapPosition(null)).toBe(Position.UNKNOWN);
  });
});

describe('extractPlayers', () => {
  it('should build a master row with team, position and price', () => {
    const { players, skipped } = extractPlayers(
      [makeRawPlayer({ id: 8, first_name: 'Bukayo', second_name: 'Saka', web_name: 'Saka', team: 1, element_type: 3, now_cost: 102 })],
      teams
    );

    expect(skipped).toEqual([]);
    expect(players).toEqual([
      {
        fpl_id: 8,
        name: 'Saka',
        full_name: 'Bukayo Saka',
        team_name: 'Arsenal',
        team_short: 'ARS',
        team_fpl_code: 1,
        position: Position.MID,
        price: 10.2,
        status: 'a',
        selected_by_percent: 4.5,
        form: 3,
        total_points: 40,
        minutes: 900,
      },
    ]);
  });

  it('should fall back to Unknown/UNK for a club outside the roster', () => {
    const { players } = extractPlayers([makeRawPlayer({ team: 20 })], teams);

    expect(players[0].team_name).toBe('Unknown');
    expect(players[0].team_short).toBe('UNK');
    expect(players[0].team_fpl_code).toBe(20);
  });

  it('should trim the full name when a part is missing', () => {
    const { players } = extractPlayers([makeRawPlayer({ first_name: undefined, second_name: 'Rodri' })], teams);

    expect(players[0].full_name).toBe('Rodri');
  });

  it('should skip players without a display name or price', () => {
    const noName = makeRawPlayer({ id: 2, web_name: '' });
    const noPrice = makeRawPlayer({ id: 3, now_cost: null });

    const { players, skipped } = extractPlayers([makeRawPlayer({ id: 1 }), noName, noPrice], teams);

    expect(players.map((player) => player.fpl_id)).toEqual([1]);
    expect(skipped).toEqual([noName, noPrice]);
  });
});
