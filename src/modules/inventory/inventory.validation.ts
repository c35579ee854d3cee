import { z } from 'zod';
import { orderConfig } from '../../connections/config/app.config';
import { sanitizeString } from '../../utils/validation';

// Validation schemas for the inventory module

export const restockSchema = z.object({
  quantity: z
    .number({ required_error: 'Quantity is required', invalid_type_error: 'Quantity must be a number' })
    .int('Quantity must be an integer')
    .min(1, 'Quantity must be at least 1')
    .max(orderConfig.maxQuantity, `Quantity must not exceed ${orderConfig.maxQuantity}`),
  reason: z
    .string({ invalid_type_error: 'Reason must be a string' })
    .transform(sanitizeString)
    .pipe(z.string().max(500, 'Reason must not exceed 500 characters'))
    .nullish(),
});

export type RestockRequest = z.infer<typeof restockSchema>;
