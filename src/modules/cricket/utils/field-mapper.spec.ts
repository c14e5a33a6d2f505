import { readAttribute, transferFields } from './field-mapper';

describe('transferFields', () => {
  it('copies present attributes under their new names', () => {
    const result = transferFields(
      [
        ['grnd', 'ground'],
        ['vcity', 'city'],
      ],
      { grnd: "Lord's", vcity: 'London' },
    );

    expect(result).toEqual({ ground: "Lord's", city: 'London' });
  });

  it('skips attributes the source does not have', () => {
    const result = transferFields(
      [
        ['grnd', 'ground'],
        ['vcity', 'city'],
      ],
      { grnd: 'Eden Gardens' },
    );

    expect(result).toEqual({ ground: 'Eden Gardens' });
    expect('city' in result).toBe(false);
  });

  it('keeps entries already in the sink and returns the same object', () => {
    const sink: Partial<Record<'ground' | 'city', string>> = { ground: 'Old Ground' };

    const result = transferFields([['vcity', 'city']], { vcity: 'Kolkata' }, sink);

    expect(result).toBe(sink);
    expect(result).toEqual({ ground: 'Old Ground', city: 'Kolkata' });
  });

  it('overwrites a sink entry when the source has a value for it', () => {
    const result = transferFields([['grnd', 'ground']], { grnd: 'New Ground' }, { ground: 'Old Ground' });

    expect(result).toEqual({ ground: 'New Ground' });
  });

  it('copies empty strings since the attribute is present', () => {
    expect(transferFields([['status', 'result_text']], { status: '' })).toEqual({ result_text: '' });
  });

  it('ignores inherited object properties', () => {
    expect(transferFields([['toString', 'ground']], {})).toEqual({});
  });
});

describe('readAttribute', () => {
  it('returns undefined for missing keys', () => {
    expect(readAttribute({ a: '1' }, 'b')).toBeUndefined();
    expect(readAttribute({ a: '1' }, 'a')).toBe('1');
  });
});
