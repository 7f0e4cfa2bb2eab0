export { NotificationFanout } from './fanout.js';
export type { ListNotificationsOptions } from './fanout.js';
