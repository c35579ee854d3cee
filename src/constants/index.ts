export * from './order.constants';
export * from './user.constants';
export * from './delivery.constants';
