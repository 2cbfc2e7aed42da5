export { NotificationRouter, classify, resourceUri, RESOURCE_SCHEME } from './router.js';
export type { Notification, NotificationSink, ResourceKind } from './router.js';
