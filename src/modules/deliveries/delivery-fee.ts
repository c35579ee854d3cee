import { orderConfig } from '../../connections/config/app.config';
import { formatCents, toCents } from '../../utils/money';

export interface DeliveryFeeRates {
  baseFee: string;
  feePerLine: string;
}

/**
 * Flat base fee plus a per-line surcharge, as a DECIMAL string
 */
export const computeDeliveryFee = (
  lineCount: number,
  rates: DeliveryFeeRates = { baseFee: orderConfig.deliveryBaseFee, feePerLine: orderConfig.deliveryFeePerLine }
): string => formatCents(toCents(rates.baseFee) + toCents(rates.feePerLine) * Math.max(0, lineCount));
