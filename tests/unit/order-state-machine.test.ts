import { describe, expect, it } from 'vitest';
import {
  getAllowedTransitions,
  isTerminalStatus,
  validateTransition,
} from '../../src/modules/orders/order-state-machine';
import { ORDER_STATUSES, OrderStatus, USER_ROLES, UserRole } from '../../src/constants';

// Written out independently of the module's tables
const ALLOWED: Record<UserRole, string[]> = {
  SHOPKEEPER: ['pending>cancelled', 'accepted>cancelled'],
  WAREHOUSE_MANAGER: ['pending>accepted', 'pending>rejected', 'accepted>assigned'],
  RIDER: ['in_transit>delivered'],
  ADMIN: [
    'pending>accepted',
    'pending>rejected',
    'pending>cancelled',
    'accepted>assigned',
    'accepted>cancelled',
    'assigned>in_transit',
    'assigned>cancelled',
    'in_transit>delivered',
    'in_transit>cancelled',
  ],
};

const TERMINAL: OrderStatus[] = ['delivered', 'rejected', 'cancelled'];

describe('validateTransition', () => {
  describe('truth table', () => {
    for (const role of USER_ROLES) {
      for (const from of ORDER_STATUSES) {
        for (const to of ORDER_STATUSES) {
          const expected = ALLOWED[role].includes(`${from}>${to}`);

          it(`${role}: ${from} -> ${to} is ${expected ? 'allowed' : 'denied'}`, () => {
            expect(validateTransition(from, to, role).allowed).toBe(expected);
          });
        }
      }
    }
  });

  it('tells a rider marking a pending order delivered that the role is not permitted', () => {
    const decision = validateTransition('pending', 'delivered', 'RIDER');

    expect(decision).toEqual({
      allowed: false,
      code: 'ROLE_NOT_PERMITTED',
      reason: 'Role RIDER cannot change an order that is pending',
    });
  });

  it('reports an invalid general transition even for admins', () => {
    const decision = validateTransition('pending', 'delivered', 'ADMIN');

    expect(decision).toEqual({
      allowed: false,
      code: 'INVALID_TRANSITION',
      reason: 'Cannot transition from pending to delivered',
    });
  });

  it('reports a table-legal move outside the role gate as not permitted', () => {
    const decision = validateTransition('pending', 'cancelled', 'WAREHOUSE_MANAGER');

    expect(decision).toEqual({
      allowed: false,
      code: 'ROLE_NOT_PERMITTED',
      reason: 'Role WAREHOUSE_MANAGER cannot transition an order from pending to cancelled',
    });
  });

  it('reports a move the table forbids as invalid when the role may act on the state', () => {
    const decision = validateTransition('accepted', 'delivered', 'WAREHOUSE_MANAGER');

    expect(decision.allowed).toBe(false);
    expect(decision).toMatchObject({ code: 'INVALID_TRANSITION' });
  });

  it.each(TERMINAL)('never lets anyone leave %s', (from) => {
    for (const role of USER_ROLES) {
      for (const to of ORDER_STATUSES) {
        expect(validateTransition(from, to, role)).toEqual({
          allowed: false,
          code: 'INVALID_TRANSITION',
          reason: `Order is ${from}; no further transitions are allowed`,
        });
      }
    }
  });

  it('rejects a same-state transition', () => {
    expect(validateTransition('accepted', 'accepted', 'ADMIN')).toMatchObject({
      allowed: false,
      code: 'INVALID_TRANSITION',
    });
  });

  it('denies unknown statuses and roles', () => {
    expect(validateTransition('shipped', 'delivered', 'ADMIN')).toEqual({
      allowed: false,
      code: 'INVALID_TRANSITION',
      reason: 'Unknown current status: shipped',
    });
    expect(validateTransition('pending', 'lost', 'ADMIN')).toEqual({
      allowed: false,
      code: 'INVALID_TRANSITION',
      reason: 'Unknown target status: lost',
    });
    expect(validateTransition('pending', 'accepted', 'GUEST')).toEqual({
      allowed: false,
      code: 'ROLE_NOT_PERMITTED',
      reason: 'Unknown role: GUEST',
    });
  });
});

describe('getAllowedTransitions', () => {
  it('lists the moves each role has from pending', () => {
    expect(getAllowedTransitions('pending', 'SHOPKEEPER')).toEqual(['cancelled']);
    expect(getAllowedTransitions('pending', 'WAREHOUSE_MANAGER')).toEqual(['accepted', 'rejected']);
    expect(getAllowedTransitions('pending', 'RIDER')).toEqual([]);
    expect(getAllowedTransitions('pending', 'ADMIN')).toEqual(['accepted', 'rejected', 'cancelled']);
  });

  it('gives the rider only the final hop', () => {
    expect(getAllowedTransitions('in_transit', 'RIDER')).toEqual(['delivered']);
    expect(getAllowedTransitions('assigned', 'RIDER')).toEqual([]);
  });

  it('is empty for terminal statuses', () => {
    for (const status of TERMINAL) {
      expect(getAllowedTransitions(status, 'ADMIN')).toEqual([]);
    }
  });
});

describe('isTerminalStatus', () => {
  it('marks delivered, rejected and cancelled as terminal', () => {
    expect(ORDER_STATUSES.filter(isTerminalStatus)).toEqual(['rejected', 'delivered', 'cancelled']);
  });
});
