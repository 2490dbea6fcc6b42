import { z } from 'zod';
import { FLOWER_SIZES } from '../types/flower.types';

/**
 * Allocation validation schemas
 */

const sizeSchema = z.enum(FLOWER_SIZES, {
  errorMap: () => ({ message: `Size must be one of ${FLOWER_SIZES.join(', ')}` }),
});

const speciesSchema = z
  .string({ required_error: 'Species is required' })
  .regex(/^[a-z]+$/, 'Species must be lowercase letters');

// Stock record (several records for one species/size add up)
export const stockRecordSchema = z.object({
  species: speciesSchema,
  size: sizeSchema,
  quantity: z
    .number({
      required_error: 'Quantity is required',
      invalid_type_error: 'Quantity must be a number',
    })
    .int('Quantity must be an integer')
    .safe('Quantity is too large')
    .nonnegative('Quantity must not be negative'),
});

// Structured bouquet design
export const designRecordSchema = z.object({
  name: z.string({ required_error: 'Name is required' }).regex(/^[A-Z]+$/, 'Name must be uppercase letters'),
  size: sizeSchema,
  total: z
    .number({
      required_error: 'Total is required',
      invalid_type_error: 'Total must be a number',
    })
    .int('Total must be an integer')
    .safe('Total is too large')
    .positive('Total must be positive'),
  required: z.array(
    z.object({
      species: speciesSchema,
      quantity: z
        .number({ invalid_type_error: 'Quantity must be a number' })
        .int('Quantity must be an integer')
        .safe('Quantity is too large')
        .positive('Quantity must be positive'),
    })
  ),
});

// Allocate from structured records
export const createAllocationSchema = z.object({
  body: z.object({
    designs: z.array(designRecordSchema).min(1, 'At least one design is required'),
    stock: z.array(stockRecordSchema),
  }),
});

// Allocate from text records (AL10a15b5c30 / aL)
export const createTextAllocationSchema = z.object({
  body: z.object({
    designs: z.array(z.string()).min(1, 'At least one design is required'),
    flowers: z.array(z.string()),
  }),
});

// Bundled sample run
export const sampleRunSchema = z.object({
  designs: z.array(z.string()),
  stock: z.array(stockRecordSchema),
});

// Infer TypeScript types from schemas
export type CreateAllocationRequest = z.infer<typeof createAllocationSchema>;
export type CreateTextAllocationRequest = z.infer<typeof createTextAllocationSchema>;
