/**
 * Unit tests for parsing JSON printed by bw
 */

import { describe, it, expect } from 'vitest';
import { parseJsonOutput, parseJsonObject, parseJsonObjectArray } from '../../src/bitwarden/json.js';
import { ParseError } from '../../src/bitwarden/errors.js';

describe('parseJsonOutput', () => {
  it('parses nested values', () => {
    expect(parseJsonOutput('{"a":[1,true,null,{"b":"c"}]}', 'bw get item')).toEqual({ a: [1, true, null, { b: 'c' }] });
  });

  it('skips warning lines before the payload', () => {
    const stdout = 'npm update check failed\nSomething else happened\n[{"id":"1"}]\n';

    expect(parseJsonOutput(stdout, 'bw list items')).toEqual([{ id: '1' }]);
  });

  it('parses a payload that spans lines after noise', () => {
    const stdout = 'Warning: old version\n{\n  "id": "1",\n  "name": "x"\n}';

    expect(parseJsonOutput(stdout, 'bw get item')).toEqual({ id: '1', name: 'x' });
  });

  it('moves past noise lines that start with a bracket', () => {
    expect(parseJsonOutput('[warn] new version\n{"id":"1"}', 'bw get item')).toEqual({ id: '1' });
  });

  it('rejects non-JSON output without quoting it', () => {
    const stdout = 'hunter2 is the password';

    const error = (() => {
      try {
        parseJsonOutput(stdout, 'bw get item');
        return null;
      } catch (e) {
        return e;
      }
    })();

    expect(error).toBeInstanceOf(ParseError);
    expect(error).toMatchObject({
      message: 'Expected JSON from bw get item, got 23 characters of other output',
      outputLength: 23,
    });
  });

  it('rejects empty output', () => {
    expect(() => parseJsonOutput('', 'bw get item')).toThrow(ParseError);
  });
});

describe('parseJsonObject', () => {
  it('accepts an object', () => {
    expect(parseJsonObject('{"login":{"username":"u"}}', 'bw get item')).toEqual({ login: { username: 'u' } });
  });

  it('keeps every key of the record', () => {
    const item = parseJsonObject('{"__proto__":{"x":1},"id":"1"}', 'bw get item');

    expect(Object.keys(item)).toEqual(['__proto__', 'id']);
    expect(Object.getPrototypeOf(item)).toBe(Object.prototype);
  });

  it('rejects a string', () => {
    expect(() => parseJsonObject('"text"', 'bw get item')).toThrow('Expected a JSON object from bw get item, got a string');
  });

  it('rejects null', () => {
    expect(() => parseJsonObject('null', 'bw get item')).toThrow('Expected a JSON object from bw get item, got null');
  });
});

describe('parseJsonObjectArray', () => {
  it('keeps order', () => {
    expect(parseJsonObjectArray('[{"n":1},{"n":2},{"n":3}]', 'bw list items')).toEqual([{ n: 1 }, { n: 2 }, { n: 3 }]);
  });

  it('rejects non-object entries', () => {
    expect(() => parseJsonObjectArray('[{"n":1},2]', 'bw list items')).toThrow(
      'Expected a JSON object at index 1 from bw list items, got a number',
    );
  });
});
