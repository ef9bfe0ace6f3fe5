import { ApprovalService, PgBookingStore } from '../core/bookingService';
import { bookingEvents, type BookingEventBus } from '../core/bookingEvents';
import type { AppConfig } from '../core/config';
import { MessagingService, PgMessagingStore } from '../core/messaging';
import { PgResourceDirectory } from '../core/resourceService';

export interface AppServices {
  approvals: ApprovalService;
  messaging: MessagingService;
  events: BookingEventBus;
}

export function createServices(config: AppConfig): AppServices {
  const bookings = PgBookingStore.create();
  const resources = new PgResourceDirectory();
  return {
    approvals: new ApprovalService({ bookings, resources, events: bookingEvents }),
    messaging: new MessagingService({
      store: PgMessagingStore.create(),
      resources,
      bookings,
      maxMessageLength: config.messageMaxLength,
    }),
    events: bookingEvents,
  };
}
