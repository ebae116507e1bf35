/**
 * Field validators for request details
 *
 * Pure functions: no session access, the current date is passed in.
 */

import { parsePhoneNumberFromString } from 'libphonenumber-js';
import {
  FIELD_METADATA,
  INCOTERM_OPTIONS,
  PACKAGING_OPTIONS,
  PAYMENT_OPTIONS,
  UNIT_OPTIONS,
  type DetailField,
  type FieldValue,
  type RequestType,
} from './fields';

export type ValidationResult =
  | { valid: true; value: FieldValue; message: string }
  | { valid: false; error: string };

export interface QuantityLimits {
  minQuantity?: number;
  maxQuantity?: number;
}

export interface ValidationContext {
  request: RequestType | null;
  limits: QuantityLimits;
  /** YYYY-MM-DD */
  today: string;
}

export function parseNumber(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const n = Number(value.trim().replace(/,/g, ''));
    return Number.isFinite(n) ? n : null;
  }
  return null;
}

/** Local calendar date as YYYY-MM-DD */
export function todayISO(now: Date = new Date()): string {
  const month = String(now.getMonth() + 1).padStart(2, '0');
  const day = String(now.getDate()).padStart(2, '0');
  return `${now.getFullYear()}-${month}-${day}`;
}

export function validateUnit(value: unknown): ValidationResult {
  const unit = String(value ?? '').trim().toUpperCase();
  if (UNIT_OPTIONS.some((u) => u === unit)) {
    return { valid: true, value: unit, message: `Unit ${unit} is valid` };
  }
  return { valid: false, error: `Invalid unit. Please select from: ${UNIT_OPTIONS.join(', ')}` };
}

/**
 * Every request needs a positive quantity. Samples are then bounded by stock
 * only; other requests by minimum order and stock.
 */
export function validateQuantity(value: unknown, request: RequestType | null, limits: QuantityLimits): ValidationResult {
  const quantity = parseNumber(value);
  if (quantity === null) {
    return { valid: false, error: 'Invalid quantity format. Please enter a valid number.' };
  }
  if (quantity <= 0) {
    return { valid: false, error: 'Quantity must be greater than 0' };
  }

  const min = limits.minQuantity ?? 1;
  const max = limits.maxQuantity ?? Infinity;

  if (request !== 'Sample' && quantity < min) {
    return { valid: false, error: `Quantity must be at least ${min} (minimum order quantity)` };
  }
  if (quantity > max) {
    return { valid: false, error: `Quantity exceeds available stock of ${max}` };
  }

  const range = request === 'Sample' ? `max: ${max}` : `min: ${min}, max: ${max}`;
  return { valid: true, value: quantity, message: `Quantity ${quantity} is valid (${range})` };
}

export function validatePositiveNumber(field: DetailField, value: unknown): ValidationResult {
  const n = parseNumber(value);
  if (n === null || n <= 0) {
    return { valid: false, error: `${field} must be a positive number` };
  }
  return { valid: true, value: n, message: `${field} ${n} is valid` };
}

export function validateDeliveryDate(value: unknown, today: string): ValidationResult {
  const text = String(value ?? '').trim();
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(text);
  const formatError = 'Invalid date format. Please use YYYY-MM-DD format (e.g., 2024-12-31)';
  if (!match) {
    return { valid: false, error: formatError };
  }

  // Reject dates like 2025-02-30 that Date would roll over
  const [year, month, day] = [Number(match[1]), Number(match[2]), Number(match[3])];
  const date = new Date(Date.UTC(year, month - 1, day));
  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    return { valid: false, error: formatError };
  }

  if (text <= today) {
    return { valid: false, error: `Delivery date must be after today (${today})` };
  }
  return { valid: true, value: text, message: `Delivery date ${text} is valid` };
}

const SELECTION_OPTIONS = {
  unit: UNIT_OPTIONS,
  incoterm: INCOTERM_OPTIONS,
  mode_of_payment: PAYMENT_OPTIONS,
  packaging_pref: PACKAGING_OPTIONS,
} as const;

export type SelectionField = keyof typeof SELECTION_OPTIONS;

/**
 * Case-insensitive option match; returns the canonical spelling
 */
export function validateSelection(field: SelectionField, value: unknown): ValidationResult {
  const options: readonly string[] = SELECTION_OPTIONS[field];
  const selected = String(value ?? '').trim().toLowerCase();
  const match = options.find((option) => option.toLowerCase() === selected);

  if (match) {
    return { valid: true, value: match, message: `Selected ${match} is valid for ${field}` };
  }
  return { valid: false, error: `Invalid selection for ${field}. Allowed options: ${options.join(', ')}` };
}

/**
 * International format required; returns E.164
 */
export function validatePhone(value: unknown): ValidationResult {
  const text = String(value ?? '').trim();
  const parsed = parsePhoneNumberFromString(text);
  if (!parsed) {
    return { valid: false, error: 'Unable to parse phone number' };
  }
  if (!parsed.isValid()) {
    return { valid: false, error: 'Invalid phone number format' };
  }
  return { valid: true, value: parsed.number, message: 'Phone number is valid' };
}

export type ExpectedPriceResult =
  | { status: 'success'; calculated_value: number; formula: string; expected_price: number }
  | { status: 'error'; calculated_value: 0; error: string };

export function calculateExpectedPrice(quantity: unknown, pricePerUnit: unknown): ExpectedPriceResult {
  const q = parseNumber(quantity);
  const p = parseNumber(pricePerUnit);
  if (q === null || p === null) {
    return { status: 'error', calculated_value: 0, error: 'Invalid input values for calculation' };
  }

  const total = q * p;
  return { status: 'success', calculated_value: total, formula: `${q} × ${p} = ${total}`, expected_price: total };
}

/**
 * Dispatch to the validator for a field
 */
export function validateField(field: DetailField, value: unknown, ctx: ValidationContext): ValidationResult {
  switch (field) {
    case 'unit':
      return validateUnit(value);
    case 'quantity':
      return validateQuantity(value, ctx.request, ctx.limits);
    case 'price_per_unit':
    case 'expected_price':
      return validatePositiveNumber(field, value);
    case 'phone':
      return validatePhone(value);
    case 'delivery_date':
      return validateDeliveryDate(value, ctx.today);
    case 'incoterm':
    case 'mode_of_payment':
    case 'packaging_pref':
      return validateSelection(field, value);
  }
}

export function describeField(field: DetailField): string {
  const meta = FIELD_METADATA[field];
  return meta.options ? `${meta.description} (${meta.options.join(' / ')})` : meta.description;
}
