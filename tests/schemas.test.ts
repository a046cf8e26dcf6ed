import { describe, it, expect } from 'vitest';
import { ZodError } from 'zod';
import { ProductRecordSchema, ValidationError, validateRecord } from '../src/schemas';

describe('ProductRecordSchema', () => {
  const validRecord = {
    date: '2024-03-05',
    category: 'Deli',
    productName: 'Smoked Ham',
    price: '$3.99',
    ounces: '16 oz',
  };

  it('validates a valid record', () => {
    expect(ProductRecordSchema.safeParse(validRecord).success).toBe(true);
  });

  it('accepts sentinel values', () => {
    const result = ProductRecordSchema.safeParse({
      ...validRecord,
      productName: 'Not found',
      price: '$Not found',
      ounces: 'Not found',
    });
    expect(result.success).toBe(true);
  });

  it('rejects a malformed date', () => {
    expect(ProductRecordSchema.safeParse({ ...validRecord, date: '03/05/2024' }).success).toBe(false);
  });

  it('rejects a price without the dollar prefix', () => {
    expect(ProductRecordSchema.safeParse({ ...validRecord, price: '3.99' }).success).toBe(false);
  });

  it('requires every field', () => {
    const { ounces, ...incomplete } = validRecord;
    expect(ounces).toBe('16 oz');
    expect(ProductRecordSchema.safeParse(incomplete).success).toBe(false);
  });
});

describe('validateRecord', () => {
  it('returns the parsed record on success', () => {
    const record = {
      date: '2024-03-05',
      category: 'Bakery',
      productName: 'Bagels',
      price: '$2.19',
      ounces: '20 oz',
    };

    const result = validateRecord(record);

    expect(result.success).toBe(true);
    expect(result.data).toEqual(record);
    expect(result.error).toBeUndefined();
  });

  it('returns a ValidationError naming the failing field', () => {
    const result = validateRecord({
      date: '2024-03-05',
      category: 'Bakery',
      productName: 'Bagels',
      price: '2.19',
      ounces: '20 oz',
    });

    expect(result.success).toBe(false);
    expect(result.error).toBeInstanceOf(ValidationError);
    expect(result.error?.field).toBe('price');
    expect(result.error?.message).toBe('Validation failed for price: price must start with $');
    expect(result.error?.zodError).toBeInstanceOf(ZodError);
  });
});
