import type { UnitOfWork } from '../../connections/db/store';
import type { OrderStatus, UserRole } from '../../constants';
import type { NotificationPublisher } from '../notifications/notification.publisher';

/**
 * Authenticated caller as supplied by the auth middleware. The role is
 * trusted as given.
 */
export interface Actor {
  id: number;
  role: UserRole;
}

export interface ServiceDeps {
  uow: UnitOfWork;
}

export interface OrderServiceDeps extends ServiceDeps {
  notifier: NotificationPublisher;
  now?: () => Date;
}

export interface TransitionRequest {
  status: OrderStatus;
  reason?: string | null;
  riderId?: number | null;
}
