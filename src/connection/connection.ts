/**
 * Connection Interface
 *
 * Transport between the driver and one physical hub. The hub engine is the
 * only user: it writes encoded commands to a fixed handle and receives
 * every notification through the single handler slot.
 */

export type NotificationHandler = (handle: number, data: Buffer) => void;

export interface Connection {
  /** Write raw command bytes to a characteristic handle */
  write(handle: number, data: Buffer): Promise<void>;

  /**
   * Install the notification callback. There is one slot; installing
   * a new handler replaces the previous one. Notifications are delivered
   * one at a time, in arrival order.
   */
  setNotificationHandler(handler: NotificationHandler): void;

  /** Start delivering notifications to the installed handler */
  enableNotifications(): Promise<void>;

  /** Drop the link. Safe to call on a connection that is already down. */
  disconnect(): Promise<void>;

  isAlive(): boolean;
}
