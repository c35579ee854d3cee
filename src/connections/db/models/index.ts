export * from './warehouse.model';
export * from './item.model';
export * from './rider.model';
export * from './order.model';
export * from './order-item.model';
export * from './delivery.model';
export * from './order-status-history.model';
