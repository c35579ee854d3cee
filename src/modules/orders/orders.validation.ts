import { z } from 'zod';
import { orderConfig } from '../../connections/config/app.config';
import { ORDER_STATUSES } from '../../constants';
import { bodyIdSchema, idSchema, sanitizeString, sanitizedText } from '../../utils/validation';

// Validation schemas for the orders module

export const orderLineSchema = z.object({
  item_id: bodyIdSchema,
  quantity: z
    .number({ required_error: 'Quantity is required', invalid_type_error: 'Quantity must be a number' })
    .int('Quantity must be an integer')
    .min(orderConfig.minQuantity, `Quantity must be at least ${orderConfig.minQuantity}`)
    .max(orderConfig.maxQuantity, `Quantity must not exceed ${orderConfig.maxQuantity}`),
});

const optionalText = (field: string, max: number) =>
  z
    .string({ invalid_type_error: `${field} must be a string` })
    .transform(sanitizeString)
    .pipe(z.string().max(max, `${field} must not exceed ${max} characters`))
    .nullish();

export const createOrderSchema = z.object({
  warehouse_id: bodyIdSchema,
  items: z
    .array(orderLineSchema, { required_error: 'Items are required', invalid_type_error: 'Items must be an array' })
    .min(1, 'Order must contain at least one item')
    .max(orderConfig.maxItemsPerOrder, `Order must not contain more than ${orderConfig.maxItemsPerOrder} items`),
  notes: optionalText('Notes', orderConfig.maxNotesLength),
});

export type CreateOrderRequest = z.infer<typeof createOrderSchema>;

export const rejectionReasonSchema = sanitizedText(
  'Rejection reason',
  orderConfig.rejectionReasonMinLength,
  orderConfig.rejectionReasonMaxLength
);

export const cancellationReasonSchema = optionalText('Reason', orderConfig.rejectionReasonMaxLength);

export const rejectOrderSchema = z.object({
  rejection_reason: z.string({ invalid_type_error: 'Rejection reason must be a string' }).nullish(),
});

export const assignRiderSchema = z.object({
  rider_id: bodyIdSchema.nullish(),
});

export const cancelOrderSchema = z.object({
  reason: z.string({ invalid_type_error: 'Reason must be a string' }).nullish(),
});

export const updateOrderStatusSchema = z.object({
  status: z.enum(ORDER_STATUSES, { errorMap: () => ({ message: 'Invalid order status' }) }),
  reason: z.string({ invalid_type_error: 'Reason must be a string' }).nullish(),
  rider_id: bodyIdSchema.nullish(),
});

export const orderListQuerySchema = z.object({
  status: z.enum(ORDER_STATUSES, { errorMap: () => ({ message: 'Invalid order status' }) }).optional(),
  page: z.coerce.number().int().min(1).default(1),
  limit: z.coerce.number().int().min(1).max(100).default(20),
});

export type OrderListQuery = z.infer<typeof orderListQuerySchema>;

export const orderIdParamSchema = z.object({ id: idSchema });

/**
 * Item ids that appear more than once, in first-seen order
 */
export const findDuplicateItemIds = (lines: ReadonlyArray<{ item_id: number }>): number[] => {
  const seen = new Set<number>();
  const duplicates = new Set<number>();

  for (const line of lines) {
    if (seen.has(line.item_id)) {
      duplicates.add(line.item_id);
    }
    seen.add(line.item_id);
  }

  return Array.from(duplicates);
};
