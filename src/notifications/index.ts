export {
  LoggerNotificationSink,
  attachNotificationSink,
  type NotificationSink,
  type TradeNotification
} from './notificationSink.js';
