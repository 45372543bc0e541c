/**
 * Barrel export for layout components.
 */

export { TitleBar } from "./TitleBar.js";
export { Footer } from "./Footer.js";
export { Notification } from "./Notification.js";
