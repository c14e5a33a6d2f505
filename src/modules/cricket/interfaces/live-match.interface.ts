export interface TeamRef {
  name: string;
  id: string;
}

export interface InningsFigures {
  team: string;
  declare: boolean;
  follow_on: boolean;
  overs: number;
  runs: number;
  wickets: number;
}

export interface InningsRecord {
  batting: InningsFigures;
  bowling: InningsFigures;
}

export type BaseField =
  | 'datapath'
  | 'id'
  | 'innings_count'
  | 'ground'
  | 'description'
  | 'city'
  | 'country'
  | 'format'
  | 'match_num';

export type StateField = 'toss_won' | 'decision' | 'state' | 'result_text';

/**
 * One match from the live feed after its duplicate reports have been merged.
 * Optional keys are left out when the feed does not carry them.
 */
export interface LiveMatch extends Partial<Record<BaseField | StateField, string>> {
  team_one?: TeamRef;
  team_two?: TeamRef;
  time: Date;
  score?: InningsRecord[];
}

/**
 * A LiveMatch as it goes over the wire: the start time is rendered as an
 * ISO-8601 string with an explicit GMT offset.
 */
export interface LiveMatchResponse extends Omit<LiveMatch, 'time'> {
  time: string;
}
