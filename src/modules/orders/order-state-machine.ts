import { ORDER_STATUSES, OrderStatus, UserRole, isOrderStatus, isUserRole } from '../../constants';

/**
 * Unconditional transition table: current status -> statuses it may move to
 */
export const ORDER_TRANSITIONS = {
  pending: ['accepted', 'rejected', 'cancelled'],
  accepted: ['assigned', 'cancelled'],
  assigned: ['in_transit', 'cancelled'],
  in_transit: ['delivered', 'cancelled'],
  delivered: [],
  rejected: [],
  cancelled: [],
} as const satisfies Record<OrderStatus, readonly OrderStatus[]>;

type RoleGate = Partial<Record<OrderStatus, readonly OrderStatus[]>>;

/**
 * Per role, the from-state -> to-states it may request. A role added to
 * UserRole without an entry here fails to compile.
 */
export const ROLE_TRANSITIONS = {
  SHOPKEEPER: {
    pending: ['cancelled'],
    accepted: ['cancelled'],
  },
  WAREHOUSE_MANAGER: {
    pending: ['accepted', 'rejected'],
    accepted: ['assigned'],
  },
  RIDER: {
    in_transit: ['delivered'],
  },
  ADMIN: ORDER_TRANSITIONS,
} as const satisfies Record<UserRole, RoleGate>;

export type TransitionDenialCode = 'INVALID_TRANSITION' | 'ROLE_NOT_PERMITTED';

export type TransitionDecision =
  | { allowed: true }
  | { allowed: false; code: TransitionDenialCode; reason: string };

const ROLE_GATES: Record<UserRole, RoleGate> = ROLE_TRANSITIONS;
const TRANSITIONS: Record<OrderStatus, readonly OrderStatus[]> = ORDER_TRANSITIONS;

export const isTerminalStatus = (status: OrderStatus): boolean => TRANSITIONS[status].length === 0;

const deny = (code: TransitionDenialCode, reason: string): TransitionDecision => ({ allowed: false, code, reason });

/**
 * Decide whether `role` may move an order from `current` to `target`.
 *
 * Checks run in this order so the reason names the first rule broken:
 * unknown status or role, terminal current status, role has no moves from
 * the current status, target not in the transition table, target not in the
 * role's moves. A RIDER asking pending -> delivered is therefore told the
 * role is not permitted, while ADMIN asking pending -> delivered is told the
 * transition itself is invalid.
 */
export const validateTransition = (current: unknown, target: unknown, role: unknown): TransitionDecision => {
  if (!isOrderStatus(current)) {
    return deny('INVALID_TRANSITION', `Unknown current status: ${String(current)}`);
  }
  if (!isOrderStatus(target)) {
    return deny('INVALID_TRANSITION', `Unknown target status: ${String(target)}`);
  }
  if (!isUserRole(role)) {
    return deny('ROLE_NOT_PERMITTED', `Unknown role: ${String(role)}`);
  }

  if (isTerminalStatus(current)) {
    return deny('INVALID_TRANSITION', `Order is ${current}; no further transitions are allowed`);
  }

  const roleMoves = ROLE_GATES[role][current];
  if (!roleMoves || roleMoves.length === 0) {
    return deny('ROLE_NOT_PERMITTED', `Role ${role} cannot change an order that is ${current}`);
  }

  if (!TRANSITIONS[current].includes(target)) {
    return deny('INVALID_TRANSITION', `Cannot transition from ${current} to ${target}`);
  }

  if (!roleMoves.includes(target)) {
    return deny('ROLE_NOT_PERMITTED', `Role ${role} cannot transition an order from ${current} to ${target}`);
  }

  return { allowed: true };
};

/**
 * Statuses `role` may move an order to from `current`, in table order
 */
export const getAllowedTransitions = (current: OrderStatus, role: UserRole): OrderStatus[] =>
  ORDER_STATUSES.filter((target) => validateTransition(current, target, role).allowed);
