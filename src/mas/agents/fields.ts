/**
 * Request-detail field catalogue
 *
 * The required-field table is a pure function of request type.
 */

export type RequestType = 'Sample' | 'Quote' | 'PPR' | 'Order';

export const DETAIL_FIELDS = [
  'unit',
  'quantity',
  'price_per_unit',
  'expected_price',
  'phone',
  'incoterm',
  'mode_of_payment',
  'packaging_pref',
  'delivery_date',
] as const;

export type DetailField = (typeof DETAIL_FIELDS)[number];

export type FieldValue = string | number;

export type DetailFields = Partial<Record<DetailField, FieldValue>>;

export interface FieldMetadata {
  type: 'select' | 'number' | 'calculated' | 'phone' | 'date';
  options?: readonly string[];
  validation?: 'positive_number' | 'future_date' | 'international_phone';
  description: string;
}

export interface FieldValidationInfo extends FieldMetadata {
  required: boolean;
}

export const UNIT_OPTIONS = ['KG', 'GAL', 'LB', 'L'] as const;
export const INCOTERM_OPTIONS = ['Ex Factory', 'Deliver to Buyer Factory'] as const;
export const PAYMENT_OPTIONS = ['LC', 'TT', 'Cash'] as const;
export const PACKAGING_OPTIONS = ['Bulk Tanker', 'PP Bag', 'Jerry Can', 'Drum'] as const;

export const FIELD_METADATA: Readonly<Record<DetailField, FieldMetadata>> = {
  unit: {
    type: 'select',
    options: UNIT_OPTIONS,
    description: 'Unit of measurement for the quantity',
  },
  quantity: {
    type: 'number',
    validation: 'positive_number',
    description: 'Quantity to order, within the product minimum and available stock',
  },
  price_per_unit: {
    type: 'number',
    validation: 'positive_number',
    description: 'Offered price per unit',
  },
  expected_price: {
    type: 'calculated',
    description: 'Quantity multiplied by price per unit',
  },
  phone: {
    type: 'phone',
    validation: 'international_phone',
    description: 'Contact phone number in international format (e.g. +8801712345678)',
  },
  incoterm: {
    type: 'select',
    options: INCOTERM_OPTIONS,
    description: 'Delivery terms',
  },
  mode_of_payment: {
    type: 'select',
    options: PAYMENT_OPTIONS,
    description: 'Payment method',
  },
  packaging_pref: {
    type: 'select',
    options: PACKAGING_OPTIONS,
    description: 'Packaging preference',
  },
  delivery_date: {
    type: 'date',
    validation: 'future_date',
    description: 'Expected delivery date (YYYY-MM-DD), after today',
  },
};

const FULL_REQUEST_FIELDS: readonly DetailField[] = [
  'unit',
  'quantity',
  'price_per_unit',
  'expected_price',
  'phone',
  'incoterm',
  'mode_of_payment',
  'packaging_pref',
  'delivery_date',
];

const REQUIRED_FIELDS: Readonly<Record<RequestType, readonly DetailField[]>> = {
  Order: FULL_REQUEST_FIELDS,
  Sample: FULL_REQUEST_FIELDS,
  Quote: FULL_REQUEST_FIELDS,
  PPR: ['unit', 'quantity', 'price_per_unit', 'expected_price', 'delivery_date'],
};

const DEFAULT_REQUIRED_FIELDS: readonly DetailField[] = ['unit', 'quantity', 'price_per_unit', 'expected_price'];

export function requiredFieldsFor(request: RequestType | null | undefined): readonly DetailField[] {
  return request ? REQUIRED_FIELDS[request] : DEFAULT_REQUIRED_FIELDS;
}

export function isDetailField(name: string): name is DetailField {
  return DETAIL_FIELDS.some((field) => field === name);
}

/** null, '', 0 and '0' all count as not provided */
export function isFilled(value: FieldValue | null | undefined): boolean {
  return value !== undefined && value !== null && value !== '' && value !== 0 && value !== '0';
}

const REQUEST_ALIASES: Readonly<Record<string, RequestType>> = {
  sample: 'Sample',
  samples: 'Sample',
  quote: 'Quote',
  quotation: 'Quote',
  rfq: 'Quote',
  ppr: 'PPR',
  'purchase price request': 'PPR',
  order: 'Order',
  purchase: 'Order',
};

export function normalizeRequestType(value: string | null | undefined): RequestType | null {
  if (!value) return null;
  return REQUEST_ALIASES[value.trim().toLowerCase()] ?? null;
}
