/**
 * Tests for value types
 */

import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import {
  VARIADIC,
  stringValue,
  flagValue,
  integerValue,
  numberValue,
  choiceValue,
  listValue,
  restValue,
  schemaValue,
} from './converters';
import { ConversionError } from '../types/parse-errors';

function conversionErrorOf(fn: () => unknown): ConversionError {
  try {
    fn();
  } catch (error) {
    if (error instanceof ConversionError) {
      return error;
    }
    throw error;
  }
  throw new Error('expected a ConversionError');
}

describe('stringValue', () => {
  it('should take the token verbatim', () => {
    expect(stringValue().convert(['  spaced out  '], '--name')).toBe('  spaced out  ');
  });

  it('should have arity 1 and an empty initial value', () => {
    const type = stringValue();
    expect(type.arity).toBe(1);
    expect(type.initial).toBe('');
  });

  it('should accept a custom initial value', () => {
    expect(stringValue('stdout').initial).toBe('stdout');
  });
});

describe('flagValue', () => {
  it('should take no tokens and start false', () => {
    const type = flagValue();
    expect(type.arity).toBe(0);
    expect(type.initial).toBe(false);
  });

  it('should always convert to true', () => {
    expect(flagValue().convert([], '--verbose')).toBe(true);
  });
});

describe('integerValue', () => {
  it('should parse signed integers', () => {
    const type = integerValue();
    expect(type.convert(['42'], '-n')).toBe(42);
    expect(type.convert(['-7'], '-n')).toBe(-7);
    expect(type.convert(['+3'], '-n')).toBe(3);
  });

  it('should reject tokens that are not fully consumed', () => {
    const error = conversionErrorOf(() => integerValue().convert(['12abc'], '--count'));
    expect(error.message).toBe('Invalid value "12abc" for --count: expected integer');
    expect(error.code).toBe('CONVERSION');
    expect(error.identifier).toBe('--count');
    expect(error.value).toBe('12abc');
    expect(error.issues).toEqual(['not an integer']);
  });

  it('should reject surrounding whitespace and empty tokens', () => {
    expect(() => integerValue().convert([' 5'], '-n')).toThrow(ConversionError);
    expect(() => integerValue().convert([''], '-n')).toThrow(ConversionError);
  });

  it('should reject decimals', () => {
    expect(() => integerValue().convert(['1.5'], '-n')).toThrow(ConversionError);
  });

  it('should convert negative zero to zero', () => {
    expect(Object.is(integerValue().convert(['-0'], '-n'), 0)).toBe(true);
    expect(Object.is(numberValue().convert(['-0.0'], '--ratio'), 0)).toBe(true);
  });

  it('should reject integers outside the safe range', () => {
    const error = conversionErrorOf(() => integerValue().convert(['9007199254740993'], '-n'));
    expect(error.issues).toEqual(['outside the safe integer range']);
  });
});

describe('numberValue', () => {
  it('should parse decimal and exponent notation', () => {
    const type = numberValue();
    expect(type.convert(['3.5'], '--ratio')).toBe(3.5);
    expect(type.convert(['-.5'], '--ratio')).toBe(-0.5);
    expect(type.convert(['1e3'], '--ratio')).toBe(1000);
    expect(type.convert(['5.'], '--ratio')).toBe(5);
  });

  it('should reject non-numeric tokens', () => {
    const error = conversionErrorOf(() => numberValue().convert(['abc'], '--ratio'));
    expect(error.message).toBe('Invalid value "abc" for --ratio: expected number');
    expect(error.issues).toEqual(['not a number']);
  });

  it('should reject values that overflow to infinity', () => {
    const error = conversionErrorOf(() => numberValue().convert(['1e999'], '--ratio'));
    expect(error.issues).toEqual(['outside the representable range']);
  });
});

describe('choiceValue', () => {
  it('should default to the first choice', () => {
    expect(choiceValue(['fast', 'slow']).initial).toBe('fast');
  });

  it('should accept a listed value', () => {
    expect(choiceValue(['fast', 'slow']).convert(['slow'], '--mode')).toBe('slow');
  });

  it('should reject an unlisted value', () => {
    const error = conversionErrorOf(() => choiceValue(['fast', 'slow']).convert(['medium'], '--mode'));
    expect(error.message).toBe('Invalid value "medium" for --mode: expected one of: fast, slow');
  });
});

describe('listValue', () => {
  it('should split, trim and convert each part', () => {
    expect(listValue(integerValue()).convert(['1, 2,3'], '--ids')).toEqual([1, 2, 3]);
  });

  it('should drop empty parts', () => {
    expect(listValue(stringValue()).convert(['a,,b,'], '--tags')).toEqual(['a', 'b']);
    expect(listValue(stringValue()).convert([''], '--tags')).toEqual([]);
  });

  it('should honor a custom separator', () => {
    expect(listValue(stringValue(), ':').convert(['/bin:/usr/bin'], '--path')).toEqual([
      '/bin',
      '/usr/bin',
    ]);
  });

  it('should report the failing part', () => {
    const error = conversionErrorOf(() => listValue(integerValue()).convert(['1,x'], '--ids'));
    expect(error.value).toBe('x');
    expect(error.identifier).toBe('--ids');
  });

  it('should describe itself by item type', () => {
    expect(listValue(integerValue()).name).toBe('list of integer');
  });
});

describe('restValue', () => {
  it('should be variadic', () => {
    expect(restValue(stringValue()).arity).toBe(VARIADIC);
    expect(restValue(stringValue()).initial).toEqual([]);
  });

  it('should convert every token', () => {
    expect(restValue(integerValue()).convert(['1', '2', '3'], '--nums')).toEqual([1, 2, 3]);
  });

  it('should accept no tokens', () => {
    expect(restValue(stringValue()).convert([], '--tail')).toEqual([]);
  });
});

describe('schemaValue', () => {
  const color = schemaValue(z.enum(['red', 'green']), 'color', 'red');

  it('should convert through the schema', () => {
    expect(color.convert(['green'], '--color')).toBe('green');
  });

  it('should wrap schema failures in a ConversionError', () => {
    const error = conversionErrorOf(() => color.convert(['blue'], '--color'));
    expect(error.expected).toBe('color');
    expect(error.issues).toHaveLength(1);
  });
});
