import { describe, it, expect } from 'vitest';
import { ValueDecoder } from './decoder';
import type { Decode, MapAccess, Visitor } from './decoder';
import { ValueEncoder } from './encoder';
import {
  CustomError,
  DuplicatedFieldError,
  ExpectedError,
  MissingFieldError,
  UnknownError,
} from './errors';
import { Value } from './value';
import * as s from './shapes';

function encode<T>(value: NoInfer<T>, shape: s.Shape<T>): Value {
  return shape.encode(value, new ValueEncoder());
}

function decode<T>(value: Value, shape: s.Shape<T>): T {
  return shape.decode(new ValueDecoder(value));
}

/**
 * Map access over a list of pairs, which unlike an object value may repeat
 * a key.
 */
class PairsAccess implements MapAccess {
  private index = 0;
  private pending: Value | undefined;

  constructor(private readonly pairs: readonly (readonly [string, Value])[]) {}

  get remaining(): number {
    return this.pairs.length - this.index;
  }

  nextKey<K>(shape: Decode<K>): IteratorResult<K, undefined> {
    if (this.index >= this.pairs.length) {
      return { done: true, value: undefined };
    }
    const [key, value] = this.pairs[this.index++];
    this.pending = value;
    return { done: false, value: shape.decode(new ValueDecoder(Value.string(key))) };
  }

  nextValue<V>(shape: Decode<V>): V {
    const value = this.pending ?? Value.null();
    this.pending = undefined;
    return shape.decode(new ValueDecoder(value));
  }

  nextEntry<K, V>(keyShape: Decode<K>, valueShape: Decode<V>): IteratorResult<[K, V], undefined> {
    const key = this.nextKey(keyShape);
    return key.done ? key : { done: false, value: [key.value, this.nextValue(valueShape)] };
  }
}

class DuplicateKeyDecoder extends ValueDecoder {
  constructor(private readonly pairs: readonly (readonly [string, Value])[]) {
    super(Value.null());
  }

  override decodeStruct<T>(_name: string, _fields: readonly string[], visitor: Visitor<T>): T {
    if (!visitor.visitMap) {
      throw new Error('struct visitor without visitMap');
    }
    return visitor.visitMap(new PairsAccess(this.pairs));
  }
}

describe('integer shapes', () => {
  it('reject out-of-range values on decode', () => {
    expect(() => decode(Value.integer(300), s.u8)).toThrow(new ExpectedError('u8', 'integer `300`'));
    expect(() => decode(Value.integer(-1), s.u32)).toThrow(new ExpectedError('u32', 'integer `-1`'));
    expect(() => decode(Value.integer(2 ** 31), s.i32)).toThrow(ExpectedError);
  });

  it('reject out-of-range values on encode', () => {
    expect(() => encode(128, s.i8)).toThrow(new CustomError('128 is not a valid i8'));
    expect(() => encode(1.5, s.u16)).toThrow(CustomError);
  });

  it('do not accept floats', () => {
    expect(() => decode(Value.float(1), s.i32)).toThrow(new ExpectedError('i32', 'type float'));
  });

  it('restore u64 values above the signed range', () => {
    const max = 2n ** 64n - 1n;
    expect(decode(encode(max, s.u64), s.u64)).toBe(max);
  });

  it('keep the sign of i64 values', () => {
    expect(decode(Value.integer(-1n), s.i64)).toBe(-1n);
  });
});

describe('float shapes', () => {
  it('accept integers', () => {
    expect(decode(Value.integer(3), s.f64)).toBe(3);
  });

  it('keep non-finite values', () => {
    expect(decode(Value.float(-Infinity), s.f64)).toBe(-Infinity);
    expect(decode(Value.float(NaN), s.f32)).toBeNaN();
  });
});

describe('char', () => {
  it('accepts one code point', () => {
    expect(decode(Value.string('😀'), s.char)).toBe('😀');
  });

  it('rejects longer strings', () => {
    expect(() => decode(Value.string('ab'), s.char)).toThrow(
      new ExpectedError('a character', 'string "ab"')
    );
    expect(() => encode('', s.char)).toThrow(new CustomError('"" is not a single character'));
  });
});

describe('bytes', () => {
  it('decodes a blob', () => {
    expect(decode(Value.blob(new Uint8Array([1, 2])), s.bytes)).toEqual(new Uint8Array([1, 2]));
  });

  it('does not decode arrays of integers', () => {
    expect(() => decode(Value.array([Value.integer(1)]), s.bytes)).toThrow(
      new ExpectedError('a byte array', 'type array')
    );
  });
});

describe('tuple', () => {
  const pair = s.tuple(s.i32, s.string);

  it('decodes an array of the exact length', () => {
    expect(decode(Value.array([Value.integer(1), Value.string('a')]), pair)).toEqual([1, 'a']);
  });

  it('rejects a short array', () => {
    expect(() => decode(Value.array([Value.integer(1)]), pair)).toThrow(
      new ExpectedError('a tuple of size 2', 'an array of length 1')
    );
  });

  it('rejects a long array', () => {
    const input = Value.array([Value.integer(1), Value.string('a'), Value.null()]);
    expect(() => decode(input, pair)).toThrow(
      new ExpectedError('a tuple of size 2', 'an array of length 3')
    );
  });
});

describe('map and record', () => {
  it('decode string keys through the key shape', () => {
    const input = Value.object({ a: Value.integer(1), b: Value.integer(2) });
    expect(decode(input, s.map(s.string, s.i32))).toEqual(new Map([['a', 1], ['b', 2]]));
    expect(decode(input, s.record(s.i32))).toEqual({ a: 1, b: 2 });
  });

  it('encode a record as an object', () => {
    expect(encode({ k: true }, s.record(s.bool))).toEqual(Value.object({ k: Value.boolean(true) }));
  });
});

describe('struct', () => {
  const Item = s.struct('Item', { id: s.i32, name: s.string, note: s.option(s.string) });
  const Strict = s.struct('Strict', { id: s.i32 }, { denyUnknownFields: true });

  it('decodes an object', () => {
    const input = Value.object({ id: Value.integer(7), name: Value.string('a'), note: Value.string('n') });
    expect(decode(input, Item)).toEqual({ id: 7, name: 'a', note: 'n' });
  });

  it('fills missing optional fields', () => {
    const input = Value.object({ id: Value.integer(7), name: Value.string('a') });
    expect(decode(input, Item)).toEqual({ id: 7, name: 'a', note: undefined });
  });

  it('reports a missing required field', () => {
    expect(() => decode(Value.object({ id: Value.integer(7) }), Item)).toThrow(
      new MissingFieldError('name')
    );
  });

  it('skips unknown fields', () => {
    const input = Value.object({ id: Value.integer(1), name: Value.string('a'), extra: Value.array([]) });
    expect(decode(input, Item)).toEqual({ id: 1, name: 'a', note: undefined });
  });

  it('rejects unknown fields when denied', () => {
    const input = Value.object({ id: Value.integer(1), extra: Value.null() });
    expect(() => decode(input, Strict)).toThrow(new UnknownError('extra'));
  });

  it('rejects a repeated field', () => {
    const decoder = new DuplicateKeyDecoder([
      ['id', Value.integer(1)],
      ['id', Value.integer(2)],
    ]);
    expect(() => Strict.decode(decoder)).toThrow(new DuplicatedFieldError('id'));
  });

  it('decodes from an array in field order', () => {
    const input = Value.array([Value.integer(7), Value.string('a')]);
    expect(decode(input, Item)).toEqual({ id: 7, name: 'a', note: undefined });
  });

  it('rejects an array that is too short', () => {
    expect(() => decode(Value.array([Value.integer(7)]), Item)).toThrow(
      new ExpectedError('struct Item with 3 elements', 'an array of length 1')
    );
  });

  it('rejects values of other types', () => {
    expect(() => decode(Value.integer(1), Item)).toThrow(new ExpectedError('struct Item', 'type integer'));
  });
});

describe('newtype and unit struct', () => {
  it('decode their inner value', () => {
    expect(decode(Value.integer(5), s.newtype('Meters', s.u32))).toBe(5);
    expect(decode(Value.array([]), s.unitStruct('Marker'))).toBeUndefined();
  });
});

describe('enumeration', () => {
  const Light = s.enumeration('Light', { Red: s.unitVariant(), Green: s.unitVariant() });

  it('rejects an unknown case name', () => {
    expect(() => decode(Value.string('Blue'), Light)).toThrow(new UnknownError('Blue'));
  });

  it('roundtrips each case', () => {
    expect(decode(encode({ tag: 'Green' }, Light), Light)).toEqual({ tag: 'Green' });
  });
});

describe('value shape', () => {
  const tree = Value.object({
    list: Value.array([Value.integer(1), Value.float(2.5), Value.null()]),
    flag: Value.boolean(false),
    data: Value.blob(new Uint8Array([7])),
    text: Value.string('t'),
  });

  it('passes a tree through the encoder unchanged', () => {
    expect(encode(tree, s.value)).toEqual(tree);
  });

  it('passes a tree through the decoder unchanged', () => {
    expect(decode(tree, s.value)).toEqual(tree);
  });
});
