import { FetchError, ParseError } from './feed.errors';

describe('ParseError', () => {
  it('names the datapath in its message', () => {
    const error = new ParseError('Match has no Tme element', '123');

    expect(error.message).toBe('Match has no Tme element (datapath 123)');
    expect(error.datapath).toBe('123');
  });

  it('keeps an empty datapath', () => {
    const error = new ParseError('Match has no Tme element', '');

    expect(error.message).toBe('Match has no Tme element (datapath )');
    expect(error.datapath).toBe('');
  });

  it('tags an untagged error once', () => {
    const tagged = new ParseError('Match has no Tme element').withDatapath('');

    expect(tagged.datapath).toBe('');
    expect(tagged.withDatapath('456')).toBe(tagged);
  });
});

describe('FetchError', () => {
  it('describes the observed status', () => {
    expect(new FetchError(404).message).toBe('Live feed returned status 404');
    expect(new FetchError(null).message).toBe('Live feed request failed');
  });
});
