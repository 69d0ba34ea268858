import { z } from 'zod';
import { ORDER_STATUSES } from '../domain/order-status.js';

/**
 * Request validation schema for checkout
 */
export const CheckoutRequestSchema = z.object({
  address_id: z.number().int().positive('address_id must be a positive integer'),
});

export type CheckoutRequest = z.infer<typeof CheckoutRequestSchema>;

export const UpdateOrderStatusRequestSchema = z.object({
  status: z.enum(ORDER_STATUSES),
});

export type UpdateOrderStatusRequest = z.infer<typeof UpdateOrderStatusRequestSchema>;

/**
 * Bearer token claims
 */
export const TokenClaimsSchema = z.object({
  sub: z.string().regex(/^[1-9]\d*$/, 'sub must be a user id'),
  role: z.enum(['admin', 'customer']),
});

export type TokenClaims = z.infer<typeof TokenClaimsSchema>;
