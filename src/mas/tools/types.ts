/**
 * Marketplace record shapes
 *
 * Vendor payloads carry many more fields than the workflow reads, so every
 * schema passes unknown keys through untouched.
 */

import { z } from 'zod';

// "N/A", blanks and nulls all read as absent
const optionalNumber = z.preprocess((value) => {
  const n = typeof value === 'string' && value.trim() !== '' ? Number(value) : value;
  return typeof n === 'number' && Number.isFinite(n) ? n : undefined;
}, z.number().optional());

export const ProductSchema = z
  .object({
    _id: z.string().min(1),
    name_en: z.string().optional(),
    brand_en: z.string().optional(),
    seller: z.unknown().optional(),
    unit: z.string().optional(),
    minQuantity: optionalNumber,
    maxQuantity: optionalNumber,
    quantity: optionalNumber,
    specification_en: z.string().optional(),
    description_en: z.string().optional(),
  })
  .passthrough();

export type Product = z.infer<typeof ProductSchema>;

export const SearchResultSchema = z
  .object({
    error: z.boolean().default(false),
    message: z.string().optional(),
    results: z
      .object({
        products: z.array(ProductSchema).default([]),
      })
      .passthrough()
      .default({ products: [] }),
  })
  .passthrough();

export type SearchResult = z.infer<typeof SearchResultSchema>;

export const AddressSchema = z
  .object({
    _id: z.string().min(1),
    addressLine: z.string().optional(),
    name: z.string().optional(),
    email: z.string().optional(),
    phoneNumber: z.union([z.string(), z.number()]).optional(),
    countryCode: z.string().optional(),
    city: z.string().optional(),
    state: z.string().optional(),
    country: z.string().optional(),
    latitude: z.union([z.string(), z.number()]).optional(),
    longitude: z.union([z.string(), z.number()]).optional(),
  })
  .passthrough();

export type Address = z.infer<typeof AddressSchema>;

export const AddressListSchema = z
  .object({
    results: z
      .object({ address: z.array(AddressSchema).default([]) })
      .passthrough()
      .default({ address: [] }),
  })
  .passthrough();

export const IndustryRecordSchema = z
  .object({
    _id: z.string().min(1),
    name_en: z.string().default(''),
    status: z.boolean().optional(),
    isDeleted: z.boolean().optional(),
  })
  .passthrough();

export const IndustryListSchema = z
  .object({
    results: z
      .object({ inventories: z.array(IndustryRecordSchema).default([]) })
      .passthrough()
      .default({ inventories: [] }),
  })
  .passthrough();

export interface Industry {
  _id: string;
  name_en: string;
}

/** Body shared by createRequirement and placeOrder responses */
export const OrderResponseSchema = z
  .object({
    error: z.boolean().optional(),
    message: z.string().optional(),
    results: z
      .object({
        requirement: z.record(z.unknown()).optional(),
        order: z.record(z.unknown()).optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

export type OrderResponse = z.infer<typeof OrderResponseSchema>;

export interface RequirementPayload {
  product: string;
  expectedPrice: number;
  address: string;
  quantity: number;
  quantityType: string;
  endDate: string;
}
