import type { Cheerio } from 'cheerio';
import type { Element } from 'domhandler';
import { ParseError } from '../errors/feed.errors';
import { readAttribute } from './field-mapper';

export interface ElementGroup {
  key: string;
  elements: Cheerio<Element>[];
}

/**
 * Bucket elements by the value of one attribute. Buckets come out in the
 * order their key was first seen and keep their elements in feed order.
 */
export function groupBy(key: string, elements: Cheerio<Element>): ElementGroup[] {
  const groups = new Map<string, ElementGroup>();

  elements.each((index, node) => {
    const value = readAttribute(node.attribs, key);
    if (value === undefined) {
      throw new ParseError(`<${node.name}> #${index + 1} has no ${key} attribute to group on`);
    }

    let group = groups.get(value);
    if (!group) {
      group = { key: value, elements: [] };
      groups.set(value, group);
    }
    group.elements.push(elements.eq(index));
  });

  return [...groups.values()];
}
