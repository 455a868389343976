// Settings feature services
export { createCapabilityService, type CapabilityService } from './capabilityService';
export {
  toastNotificationService,
  type NotificationDuration,
  type NotificationService,
} from './notificationService';
export { settingsService } from './settingsService';
