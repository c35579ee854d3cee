import { describe, expect, it } from 'vitest';
import { computeDeliveryFee } from '../../src/modules/deliveries/delivery-fee';

describe('computeDeliveryFee', () => {
  it('adds a surcharge per order line to the base fee', () => {
    expect(computeDeliveryFee(1)).toBe('22.50');
    expect(computeDeliveryFee(2)).toBe('25.00');
  });

  it('charges the base fee for no lines', () => {
    expect(computeDeliveryFee(0)).toBe('20.00');
    expect(computeDeliveryFee(-3)).toBe('20.00');
  });

  it('takes custom rates', () => {
    expect(computeDeliveryFee(3, { baseFee: '5', feePerLine: '0.35' })).toBe('6.05');
  });
});
