/**
 * End-to-end roundtrip tests through the value tree, the binary form and the
 * JSON text form.
 */

import { describe, it, expect } from 'vitest';
import {
  type Infer,
  Value,
  decodeValue,
  encodeValue,
  fromBytes,
  fromJsonText,
  fromValue,
  shape as s,
  toBytes,
  toJsonText,
  toValue,
  valueEquals,
} from '../../src';

const ScalarTypes = s.struct('ScalarTypes', {
  boolVal: s.bool,
  int8Val: s.i8,
  int32Val: s.i32,
  int64Val: s.i64,
  uint16Val: s.u16,
  uint32Val: s.u32,
  uint64Val: s.u64,
  float32Val: s.f32,
  float64Val: s.f64,
  charVal: s.char,
  stringVal: s.string,
  bytesVal: s.bytes,
});

const NestedMessage = s.struct('NestedMessage', { name: s.string, value: s.i32 });

const Status = s.enumeration('Status', {
  Active: s.unitVariant(),
  Suspended: s.newtypeVariant(s.string),
  Resized: s.tupleVariant(s.u32, s.u32),
  Moved: s.structVariant({ x: s.i32, y: s.i32 }),
});

const ComplexTypes = s.struct('ComplexTypes', {
  status: Status,
  optionalNested: s.option(NestedMessage),
  requiredNested: NestedMessage,
  nestedList: s.array(NestedMessage),
  stringIntMap: s.record(s.i32),
  labelMap: s.map(s.string, s.array(s.string)),
  pair: s.tuple(s.i64, s.bool),
  marker: s.unitStruct('Marker'),
  id: s.newtype('Id', s.u32),
  empty: s.unit,
});

// Test data
const TestData = {
  scalarTypes: {
    boolVal: true,
    int8Val: -128,
    int32Val: -42,
    int64Val: -9223372036854775807n,
    uint16Val: 65535,
    uint32Val: 4294967295,
    uint64Val: 18446744073709551615n,
    float32Val: 3.5,
    float64Val: 2.718281828459045,
    charVal: 'λ',
    stringVal: 'hello, binvalue!',
    bytesVal: new Uint8Array([0x01, 0x02, 0x03, 0x04]),
  } satisfies Infer<typeof ScalarTypes>,

  complexTypes: {
    status: { tag: 'Moved', value: { x: -3, y: 9 } },
    optionalNested: undefined,
    requiredNested: { name: 'required', value: 789 },
    nestedList: [
      { name: 'first', value: 1 },
      { name: 'second', value: 2 },
    ],
    stringIntMap: { one: 1, two: 2, three: 3 },
    labelMap: new Map([
      ['colors', ['red', 'green']],
      ['none', []],
    ]),
    pair: [0n, false],
    marker: undefined,
    id: 12,
    empty: undefined,
  } satisfies Infer<typeof ComplexTypes>,
};

const statuses: Infer<typeof Status>[] = [
  { tag: 'Active' },
  { tag: 'Suspended', value: 'maintenance' },
  { tag: 'Resized', value: [640, 480] },
  { tag: 'Moved', value: { x: 0, y: -1 } },
];

describe('roundtrip', () => {
  describe('through the value tree', () => {
    it('scalar types', () => {
      const value = toValue(TestData.scalarTypes, ScalarTypes);
      expect(fromValue(value, ScalarTypes)).toEqual(TestData.scalarTypes);
    });

    it('complex types', () => {
      const value = toValue(TestData.complexTypes, ComplexTypes);
      expect(fromValue(value, ComplexTypes)).toEqual(TestData.complexTypes);
    });

    it('every enum case', () => {
      for (const status of statuses) {
        expect(fromValue(toValue(status, Status), Status)).toEqual(status);
      }
    });
  });

  describe('through bytes', () => {
    it('scalar types', () => {
      const data = toBytes(TestData.scalarTypes, ScalarTypes);
      expect(fromBytes(data, ScalarTypes)).toEqual(TestData.scalarTypes);
    });

    it('complex types', () => {
      const data = toBytes(TestData.complexTypes, ComplexTypes);
      expect(fromBytes(data, ComplexTypes)).toEqual(TestData.complexTypes);
    });

    it('bytes are the binary form of the value tree', () => {
      const value = toValue(TestData.complexTypes, ComplexTypes);
      const data = toBytes(TestData.complexTypes, ComplexTypes);
      expect(encodeValue(value)).toEqual(data);
      expect(valueEquals(decodeValue(data).value, value)).toBe(true);
    });
  });

  describe('through JSON text', () => {
    it('keeps a struct readable', () => {
      const value = toValue({ name: 'first', value: 1 }, NestedMessage);
      const text = toJsonText(value);
      expect(text).toBe('{"name":"first","value":1}');
      expect(fromValue(fromJsonText(text), NestedMessage)).toEqual({ name: 'first', value: 1 });
    });

    it('keeps enum cases readable', () => {
      expect(toJsonText(toValue({ tag: 'Active' }, Status))).toBe('"Active"');
      expect(toJsonText(toValue({ tag: 'Resized', value: [640, 480] }, Status))).toBe(
        '{"Resized":[640,480]}'
      );
    });

    it('reads unit as an empty array', () => {
      expect(fromValue(fromJsonText('[]'), s.unit)).toBeUndefined();
      expect(valueEquals(fromJsonText('[]'), Value.array([]))).toBe(true);
    });
  });
});
