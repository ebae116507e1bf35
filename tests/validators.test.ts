import { describe, it, expect } from 'vitest';
import {
  calculateExpectedPrice,
  parseNumber,
  todayISO,
  validateDeliveryDate,
  validateField,
  validatePhone,
  validatePositiveNumber,
  validateQuantity,
  validateSelection,
  validateUnit,
} from '../src/mas/agents/validators';
import { isFilled, normalizeRequestType, requiredFieldsFor } from '../src/mas/agents/fields';

describe('Required-field table', () => {
  it('requires all nine fields for Order, Sample and Quote', () => {
    for (const request of ['Order', 'Sample', 'Quote'] as const) {
      expect(requiredFieldsFor(request)).toEqual([
        'unit',
        'quantity',
        'price_per_unit',
        'expected_price',
        'phone',
        'incoterm',
        'mode_of_payment',
        'packaging_pref',
        'delivery_date',
      ]);
    }
  });

  it('requires five fields for PPR', () => {
    expect(requiredFieldsFor('PPR')).toEqual(['unit', 'quantity', 'price_per_unit', 'expected_price', 'delivery_date']);
  });

  it('falls back to four fields without a request type', () => {
    expect(requiredFieldsFor(null)).toEqual(['unit', 'quantity', 'price_per_unit', 'expected_price']);
  });

  it('normalizes request type aliases', () => {
    expect(normalizeRequestType('quotation')).toBe('Quote');
    expect(normalizeRequestType(' SAMPLE ')).toBe('Sample');
    expect(normalizeRequestType('purchase price request')).toBe('PPR');
    expect(normalizeRequestType('tender')).toBeNull();
  });

  it('treats empty and zero values as not filled', () => {
    expect(isFilled('')).toBe(false);
    expect(isFilled(0)).toBe(false);
    expect(isFilled('0')).toBe(false);
    expect(isFilled(undefined)).toBe(false);
    expect(isFilled('KG')).toBe(true);
    expect(isFilled(5)).toBe(true);
  });
});

describe('Quantity validation', () => {
  const limits = { minQuantity: 100, maxQuantity: 5000 };

  it('accepts a quantity inside the range', () => {
    expect(validateQuantity('500', 'Order', limits)).toEqual({
      valid: true,
      value: 500,
      message: 'Quantity 500 is valid (min: 100, max: 5000)',
    });
  });

  it('rejects below the minimum for non-sample requests', () => {
    expect(validateQuantity(50, 'Order', limits)).toEqual({
      valid: false,
      error: 'Quantity must be at least 100 (minimum order quantity)',
    });
  });

  it('ignores the minimum for samples', () => {
    expect(validateQuantity(5, 'Sample', limits)).toEqual({
      valid: true,
      value: 5,
      message: 'Quantity 5 is valid (max: 5000)',
    });
  });

  it('rejects above available stock', () => {
    expect(validateQuantity('6000', 'Sample', limits)).toEqual({
      valid: false,
      error: 'Quantity exceeds available stock of 5000',
    });
  });

  it('rejects non-numeric and non-positive input', () => {
    expect(validateQuantity('lots', 'Order', limits)).toEqual({
      valid: false,
      error: 'Invalid quantity format. Please enter a valid number.',
    });
    expect(validateQuantity(0, 'Sample', limits)).toEqual({ valid: false, error: 'Quantity must be greater than 0' });
  });

  it('defaults the minimum to 1 without product limits', () => {
    expect(validateQuantity('1,200', 'Order', {})).toEqual({
      valid: true,
      value: 1200,
      message: 'Quantity 1200 is valid (min: 1, max: Infinity)',
    });
  });
});

describe('Delivery date validation', () => {
  const today = '2030-01-15';

  it('accepts a date after today', () => {
    expect(validateDeliveryDate('2030-01-16', today)).toEqual({
      valid: true,
      value: '2030-01-16',
      message: 'Delivery date 2030-01-16 is valid',
    });
  });

  it('rejects today and earlier', () => {
    expect(validateDeliveryDate('2030-01-15', today)).toEqual({
      valid: false,
      error: 'Delivery date must be after today (2030-01-15)',
    });
  });

  it('rejects malformed and impossible dates', () => {
    const error = 'Invalid date format. Please use YYYY-MM-DD format (e.g., 2024-12-31)';
    expect(validateDeliveryDate('15/02/2030', today)).toEqual({ valid: false, error });
    expect(validateDeliveryDate('2030-02-30', today)).toEqual({ valid: false, error });
  });

  it('formats the local date', () => {
    expect(todayISO(new Date(2030, 0, 5, 12))).toBe('2030-01-05');
  });
});

describe('Selections, phone and price', () => {
  it('returns the canonical spelling of an option', () => {
    expect(validateSelection('packaging_pref', 'pp bag')).toEqual({
      valid: true,
      value: 'PP Bag',
      message: 'Selected PP Bag is valid for packaging_pref',
    });
    expect(validateUnit('gal')).toEqual({ valid: true, value: 'GAL', message: 'Unit GAL is valid' });
  });

  it('lists allowed options on a bad selection', () => {
    expect(validateSelection('mode_of_payment', 'Bitcoin')).toEqual({
      valid: false,
      error: 'Invalid selection for mode_of_payment. Allowed options: LC, TT, Cash',
    });
    expect(validateUnit('ton')).toEqual({ valid: false, error: 'Invalid unit. Please select from: KG, GAL, LB, L' });
  });

  it('normalizes a valid phone number to E.164', () => {
    expect(validatePhone('+1 201 555 0123')).toEqual({
      valid: true,
      value: '+12015550123',
      message: 'Phone number is valid',
    });
  });

  it('rejects a number without a country code', () => {
    expect(validatePhone('12345')).toEqual({ valid: false, error: 'Unable to parse phone number' });
  });

  it('multiplies quantity by unit price', () => {
    expect(calculateExpectedPrice('10', 25)).toEqual({
      status: 'success',
      calculated_value: 250,
      formula: '10 × 25 = 250',
      expected_price: 250,
    });
    expect(calculateExpectedPrice('ten', 25)).toEqual({
      status: 'error',
      calculated_value: 0,
      error: 'Invalid input values for calculation',
    });
  });

  it('requires a positive unit price', () => {
    expect(validatePositiveNumber('price_per_unit', '-3')).toEqual({
      valid: false,
      error: 'price_per_unit must be a positive number',
    });
    expect(parseNumber('2,500.5')).toBe(2500.5);
  });

  it('dispatches by field name', () => {
    const ctx = { request: 'Order' as const, limits: {}, today: '2030-01-15' };
    expect(validateField('incoterm', 'ex factory', ctx)).toEqual({
      valid: true,
      value: 'Ex Factory',
      message: 'Selected Ex Factory is valid for incoterm',
    });
  });
});
