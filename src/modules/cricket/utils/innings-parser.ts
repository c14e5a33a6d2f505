import type { Cheerio } from 'cheerio';
import { isTag, isText } from 'domhandler';
import type { AnyNode, Element } from 'domhandler';
import { ParseError } from '../errors/feed.errors';
import { InningsFigures, InningsRecord } from '../interfaces/live-match.interface';
import { readAttribute } from './field-mapper';

const FALSE_FLAGS = new Set(['', '0', 'false', 'no', 'n']);
const DECIMAL = /^\d+(\.\d+)?$/;
const INTEGER = /^\d+$/;

/**
 * Feed flags such as Decl="1" or FollowOn="0". Empty, "0", "false", "no"
 * and "n" (any case, surrounding blanks ignored) are false; anything else
 * is true.
 */
export function coerceFlag(value: string | undefined): boolean {
  if (value === undefined) {
    return false;
  }
  return !FALSE_FLAGS.has(value.trim().toLowerCase());
}

function requireAttribute(element: Element, key: string): string {
  const value = readAttribute(element.attribs, key);
  if (value === undefined) {
    throw new ParseError(`<${element.name}> is missing the ${key} attribute`);
  }
  return value;
}

function parseDecimal(element: Element, key: string): number {
  const raw = requireAttribute(element, key).trim();
  if (!DECIMAL.test(raw)) {
    throw new ParseError(`<${element.name}> ${key}="${raw}" is not a number`);
  }
  return parseFloat(raw);
}

function parseInteger(element: Element, key: string): number {
  const raw = requireAttribute(element, key).trim();
  if (!INTEGER.test(raw)) {
    throw new ParseError(`<${element.name}> ${key}="${raw}" is not a whole number`);
  }
  return parseInt(raw, 10);
}

function parseSide(node: AnyNode | undefined, role: 'batting' | 'bowling'): InningsFigures {
  if (!node || !isTag(node)) {
    throw new ParseError(`Score block is missing the ${role} side`);
  }

  const team = requireAttribute(node, 'sName');
  const innings = node.children.find((child): child is Element => isTag(child) && child.name === 'Inngs');
  if (!innings) {
    throw new ParseError(`<${node.name} sName="${team}"> has no Inngs element`);
  }

  return {
    team,
    declare: coerceFlag(readAttribute(innings.attribs, 'Decl')),
    follow_on: coerceFlag(readAttribute(innings.attribs, 'FollowOn')),
    overs: parseDecimal(innings, 'ovrs'),
    runs: parseInteger(innings, 'r'),
    wickets: parseInteger(innings, 'wkts'),
  };
}

/**
 * Children of the score block that carry data. Whitespace between elements
 * does not count towards the detail/batting/bowling positions.
 */
export function meaningfulChildren(score: Cheerio<Element>): AnyNode[] {
  return score
    .contents()
    .toArray()
    .filter((node) => isTag(node) || (isText(node) && node.data.trim() !== ''));
}

/**
 * Split a match's `mscr` block into innings. Children come in threes:
 * innings detail (dropped), batting side, bowling side. Anything past the
 * sixth child is ignored.
 */
export function parseInnings(score: Cheerio<Element>): InningsRecord[] {
  const children = meaningfulChildren(score);
  if (children.length < 3) {
    throw new ParseError(`Score block has ${children.length} children, expected at least 3`);
  }

  const innings: InningsRecord[] = [
    { batting: parseSide(children[1], 'batting'), bowling: parseSide(children[2], 'bowling') },
  ];

  if (children.length > 3) {
    innings.push({ batting: parseSide(children[4], 'batting'), bowling: parseSide(children[5], 'bowling') });
  }

  return innings;
}
