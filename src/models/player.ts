/**
 * Player Models
 *
 * Player master table written to players.csv: one row per player with
 * identity and current point-in-time values.
 */

/**
 * Playing position
 */
export enum Position {
  GK = 'GK',
  DEF = 'DEF',
  MID = 'MID',
  FWD = 'FWD',
  UNKNOWN = 'UNK',
}

/**
 * API element_type to position
 */
export const POSITION_BY_ELEMENT_TYPE: Readonly<Record<number, Position>> = {
  1: Position.GK,
  2: Position.DEF,
  3: Position.MID,
  4: Position.FWD,
};

/**
 * Player master row as persisted
 */
export interface PlayerMasterRow {
  fpl_id: number;
  name: string;                        // Display name (web_name)
  full_name: string;                   // "first_name second_name", trimmed
  team_name: string;                   // "Unknown" when the club is not in the roster
  team_short: string;                  // "UNK" when the club is not in the roster
  team_fpl_code: number | null;
  position: Position;
  price: number;                       // now_cost / 10 (e.g., 125 -> 12.5)
  status: string | null;
  selected_by_percent: number | null;
  form: number | null;
  total_points: number;
  minutes: number;
}

/**
 * CSV column order for players.csv
 */
export const PLAYER_COLUMNS: readonly (keyof PlayerMasterRow)[] = [
  'fpl_id',
  'name',
  'full_name',
  'team_name',
  'team_short',
  'team_fpl_code',
  'position',
  'price',
  'status',
  'selected_by_percent',
  'form',
  'total_points',
  'minutes',
];

/**
 * Map API element_type to Position
 */
export function mapPosition(elementType: number | null): Position {
  if (elementType === null) {
    return Position.UNKNOWN;
  }
  return POSITION_BY_ELEMENT_TYPE[elementType] ?? Position.UNKNOWN;
}
