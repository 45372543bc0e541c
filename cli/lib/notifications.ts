/**
 * Notification values shown in the toast bar.
 *
 * Every notice carries a fresh id so that repeating the same message
 * restarts its dismiss timer.
 */

export type NotificationType = "info" | "error" | "success";

export interface Notice {
  id: number;
  message: string;
  type: NotificationType;
}

export function nextNotice(
  previous: Notice | null,
  message: string,
  type: NotificationType,
): Notice {
  return { id: (previous?.id ?? 0) + 1, message, type };
}
