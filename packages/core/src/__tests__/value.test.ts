import { describe, it, expect } from 'vitest';
import { toDataValue, valuesEqual, getPath, cloneValue, isTable } from '../value';
import { MobParseError } from '../errors';
import { parseToml, stringifyToml } from '../toml';

describe('toDataValue', () => {
  it('accepts nested tables and arrays', () => {
    const raw = { a: [1, 'two', { b: true }] };
    expect(toDataValue(raw)).toEqual(raw);
  });

  it('rejects dates', () => {
    expect(() => toDataValue({ when: new Date(0) })).toThrow('Datetime values are not supported (at "when")');
  });

  it('rejects null with the offending location', () => {
    expect(() => toDataValue({ list: [1, null] })).toThrow(MobParseError);
    expect(() => toDataValue({ list: [1, null] })).toThrow('Unsupported null value at "list[1]"');
  });

  it('keeps a __proto__ key as plain data', () => {
    const value = toDataValue(JSON.parse('{"__proto__":{"health":3}}'));
    expect(isTable(value)).toBe(true);
    if (!isTable(value)) return;
    expect(Object.keys(value)).toEqual(['__proto__']);
    expect(Object.getPrototypeOf(value)).toBe(Object.prototype);
    expect(value.health).toBeUndefined();
  });
});

describe('valuesEqual', () => {
  it('ignores table key order', () => {
    expect(valuesEqual({ a: 1, b: 2 }, { b: 2, a: 1 })).toBe(true);
  });

  it('respects array order', () => {
    expect(valuesEqual([1, 2], [2, 1])).toBe(false);
  });

  it('treats integral floats and integers as equal', () => {
    expect(valuesEqual(parseToml('z = 0').z, parseToml('z = 0.0').z)).toBe(true);
  });

  it('distinguishes tables from arrays', () => {
    expect(valuesEqual({}, [])).toBe(false);
  });

  it('treats a missing key as different', () => {
    expect(valuesEqual({ a: 1 }, { a: 1, b: 2 })).toBe(false);
  });
});

describe('getPath', () => {
  it('follows nested keys', () => {
    expect(getPath({ a: { b: { c: 3 } } }, ['a', 'b', 'c'])).toBe(3);
  });

  it('returns undefined for missing steps', () => {
    expect(getPath({ a: 1 }, ['a', 'b'])).toBeUndefined();
  });
});

describe('cloneValue', () => {
  it('produces an independent copy', () => {
    const original = { list: [{ x: 1 }] };
    const copy = cloneValue(original);
    copy.list.push({ x: 2 });
    expect(original.list).toHaveLength(1);
  });
});

describe('parseToml', () => {
  it('parses a document into a table', () => {
    const doc = parseToml('name = "Grunt"\nhealth = 50\n\n[behavior]\ntype = "Forever"\n');
    expect(doc).toEqual({ name: 'Grunt', health: 50, behavior: { type: 'Forever' } });
  });

  it('accepts byte buffers', () => {
    const bytes = new TextEncoder().encode('health = 5');
    expect(parseToml(bytes)).toEqual({ health: 5 });
  });

  it('reports syntax errors with the source name', () => {
    expect(() => parseToml('name = ', 'mobs/bad.mob')).toThrow(MobParseError);
    try {
      parseToml('name = ', 'mobs/bad.mob');
    } catch (e: unknown) {
      expect(e instanceof MobParseError && e.source).toBe('mobs/bad.mob');
    }
  });

  it('never lets a __proto__ table change the document prototype', () => {
    const doc = parseToml('name = "Grunt"\n[__proto__]\nhealth = 3\n');
    expect(Object.getPrototypeOf(doc)).toBe(Object.prototype);
    expect(doc.health).toBeUndefined();
    expect(doc.name).toBe('Grunt');
  });

  it('rejects datetime values', () => {
    expect(() => parseToml('spawned = 1979-05-27T07:32:00Z')).toThrow('Datetime values are not supported');
  });
});

describe('stringifyToml', () => {
  it('round-trips through parseToml', () => {
    const doc = {
      name: 'Grunt',
      colliders: [{ shape: { Rectangle: [10, 12] }, position: [0, 0], rotation: 0 }],
      behavior: { type: 'Forever', children: [{ type: 'Wait', seconds: 1.5 }] },
    };
    const parsed = parseToml(stringifyToml(doc));
    expect(parsed).toEqual(doc);
    expect(isTable(parsed.behavior)).toBe(true);
  });
});
