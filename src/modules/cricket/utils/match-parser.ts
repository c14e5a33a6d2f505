import type { Cheerio } from 'cheerio';
import type { Element } from 'domhandler';
import { ParseError } from '../errors/feed.errors';
import { BaseField, LiveMatch, StateField, TeamRef } from '../interfaces/live-match.interface';
import { FieldPair, readAttribute, transferFields } from './field-mapper';
import { constructMatchTime } from './match-time';
import { parseInnings } from './innings-parser';

export const BASE_FIELDS: ReadonlyArray<FieldPair<BaseField>> = [
  ['datapath', 'datapath'],
  ['id', 'id'],
  ['inngCnt', 'innings_count'],
  ['grnd', 'ground'],
  ['mchDesc', 'description'],
  ['vcity', 'city'],
  ['vcountry', 'country'],
  ['type', 'format'],
  ['mnum', 'match_num'],
];

export const STATE_FIELDS: ReadonlyArray<FieldPair<StateField>> = [
  ['TW', 'toss_won'],
  ['decisn', 'decision'],
  ['mchState', 'state'],
  ['status', 'result_text'],
];

function toTeam(element: Element): TeamRef {
  const name = readAttribute(element.attribs, 'Name');
  const id = readAttribute(element.attribs, 'id');
  if (name === undefined || id === undefined) {
    throw new ParseError('<Tm> needs both Name and id');
  }
  return { name, id };
}

/**
 * The two sides of a match, in document order. Any count other than two
 * yields undefined rather than a partial pair.
 */
export function extractTeams(match: Cheerio<Element>): [TeamRef, TeamRef] | undefined {
  const teams = match.children('Tm').toArray();
  if (teams.length !== 2) {
    return undefined;
  }
  return [toTeam(teams[0]), toTeam(teams[1])];
}

/**
 * Normalize one `<match>` report. Throws ParseError when the time element is
 * missing or any present value is malformed.
 */
export function parseSingleMatch(match: Cheerio<Element>): LiveMatch {
  const node = match.get(0);
  if (!node) {
    throw new ParseError('Empty match selection');
  }

  const fields = transferFields(BASE_FIELDS, node.attribs);

  const teams = extractTeams(match);

  const state = match.find('state').get(0);
  const stateFields = state ? transferFields(STATE_FIELDS, state.attribs) : {};

  const timeElement = match.find('Tme').get(0);
  if (!timeElement) {
    throw new ParseError('Match has no Tme element');
  }

  const record: LiveMatch = {
    ...fields,
    ...(teams ? { team_one: teams[0], team_two: teams[1] } : {}),
    ...stateFields,
    time: constructMatchTime(timeElement),
  };

  const score = match.find('mscr').first();
  if (score.length > 0) {
    record.score = parseInnings(score);
  }

  return record;
}

/**
 * Fold every report of one match into a single record. Later reports win
 * key by key; keys only an earlier report carries are kept.
 */
export function joinMatchGroup(group: ReadonlyArray<Cheerio<Element>>): LiveMatch {
  if (group.length === 0) {
    throw new ParseError('Cannot merge an empty match group');
  }

  const [first, ...rest] = group.map(parseSingleMatch);
  return rest.reduce<LiveMatch>((merged, next) => Object.assign(merged, next), first);
}
