import { describe, it, expect } from 'vitest';
import { LosslessNumber } from 'lossless-json';
import { numberFromText, toSourceDocument } from '../../src/domain/services/toSourceDocument.js';

describe('numberFromText', () => {
  it('should return safe integers as numbers', () => {
    expect(numberFromText('1965')).toBe(1965);
    expect(numberFromText('-9007199254740991')).toBe(-9007199254740991);
  });

  it('should return larger integers within int64 as bigint', () => {
    expect(numberFromText('9007199254740993')).toBe(9007199254740993n);
    expect(numberFromText('-9223372036854775808')).toBe(-9223372036854775808n);
  });

  it('should return integers beyond int64 as the nearest double', () => {
    expect(numberFromText('9223372036854775808')).toBe(9223372036854775808);
  });

  it('should return decimals and exponents as doubles', () => {
    expect(numberFromText('10.0')).toBe(10);
    expect(numberFromText('10.5')).toBe(10.5);
    expect(numberFromText('1e3')).toBe(1000);
  });
});

describe('toSourceDocument', () => {
  it('should convert parsed numbers and leave other values alone', () => {
    const document = toSourceDocument({
      title: 'Dune',
      year: new LosslessNumber('1965'),
      id: new LosslessNumber('9007199254740993'),
      tags: ['classic'],
      inPrint: true,
    });

    expect(document).toEqual({ title: 'Dune', year: 1965, id: 9007199254740993n, tags: ['classic'], inPrint: true });
  });

  it('should keep field order', () => {
    const document = toSourceDocument({ b: new LosslessNumber('1'), a: 'x' });

    expect(Object.keys(document)).toEqual(['b', 'a']);
  });
});
