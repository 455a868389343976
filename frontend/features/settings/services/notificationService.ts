// One-shot user advisories shown as toasts

import { toast } from 'sonner';
import { NOTIFICATION_DURATION_MS } from '../constants';

export type NotificationDuration = keyof typeof NOTIFICATION_DURATION_MS;

export interface NotificationService {
  show: (message: string, duration: NotificationDuration) => void;
}

/**
 * Notification service backed by the app's sonner Toaster
 */
export const toastNotificationService: NotificationService = {
  show(message, duration) {
    toast(message, { duration: NOTIFICATION_DURATION_MS[duration] });
  },
};
