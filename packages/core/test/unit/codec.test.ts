import { bodyText, decodeJSON, encodeJSON, ExchangeError } from '../../src';

async function readStream(stream: ReadableStream<Uint8Array>): Promise<string> {
  const reader = stream.getReader();
  const decoder = new TextDecoder();
  let text = '';
  for (;;) {
    const { done, value } = await reader.read();
    if (done) {
      return text;
    }
    text += decoder.decode(value, { stream: true });
  }
}

describe('encodeJSON', () => {
  it('should encode a value as newline-terminated JSON', async () => {
    const stream = encodeJSON({ someProperty: 'someValue' });

    await expect(readStream(stream)).resolves.toBe('{"someProperty":"someValue"}\n');
  });

  it('should encode null', async () => {
    await expect(readStream(encodeJSON(null))).resolves.toBe('null\n');
  });

  it('should throw serialize_error on circular references', () => {
    const value: Record<string, unknown> = { name: 'loop' };
    value['self'] = value;

    let caught: unknown;
    try {
      encodeJSON(value);
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(ExchangeError);
    const error = caught as ExchangeError;
    expect(error.code).toBe('serialize_error');
    expect(error.cause).toBeInstanceOf(Error);
  });

  it('should throw serialize_error on BigInt', () => {
    expect(() => encodeJSON({ count: BigInt(1) })).toThrow(ExchangeError);
  });

  it('should throw serialize_error when the value has no JSON form', () => {
    expect(() => encodeJSON(undefined)).toThrow('Serialize error: value has no JSON representation');
  });
});

describe('decodeJSON', () => {
  it('should decode UTF-8 bytes', () => {
    const bytes = new TextEncoder().encode('{"someProperty":"someValue"}');

    expect(decodeJSON<{ someProperty: string }>(bytes)).toEqual({ someProperty: 'someValue' });
  });

  it('should decode a string', () => {
    expect(decodeJSON<number[]>('[1,2,3]')).toEqual([1, 2, 3]);
  });

  it('should round-trip a value through encodeJSON', async () => {
    const text = await readStream(encodeJSON({ someProperty: 'struct property value' }));

    const decoded = decodeJSON<{ someProperty: string }>(text);

    expect(decoded.someProperty).toBe('struct property value');
  });

  it('should throw parse_error on malformed JSON', () => {
    let caught: unknown;
    try {
      decodeJSON('not valid json');
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(ExchangeError);
    expect((caught as ExchangeError).code).toBe('parse_error');
    expect((caught as ExchangeError).message).toMatch(/^Parse error: /);
  });

  it('should throw parse_error on an empty body', () => {
    expect(() => decodeJSON(new Uint8Array(0))).toThrow(ExchangeError);
  });
});

describe('bodyText', () => {
  it('should decode the body as UTF-8', () => {
    const entity = { body: new TextEncoder().encode('héllo') };

    expect(bodyText(entity)).toBe('héllo');
  });

  it('should return an empty string for an empty body', () => {
    expect(bodyText({ body: new Uint8Array(0) })).toBe('');
  });
});
