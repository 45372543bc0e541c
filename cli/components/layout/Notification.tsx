/**
 * Toast-style notification component.
 *
 * Renders a colored bar that auto-dismisses after a timeout. Positioned
 * between the canvas and the footer in the layout stack.
 */

import React, { useEffect } from "react";
import { Box, Text } from "ink";

import { statusColor } from "@/lib/theme/ink-colors.js";

import type { NotificationType } from "../../lib/notifications.js";

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

const DISMISS_MS = 3000;

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

interface NotificationProps {
  /** Changes for every notice shown, even a repeated one. */
  id: number;
  message: string;
  type: NotificationType;
  onDismiss: () => void;
}

// ---------------------------------------------------------------------------
// Component
// ---------------------------------------------------------------------------

export function Notification({ id, message, type, onDismiss }: NotificationProps) {
  // Auto-dismiss timer
  useEffect(() => {
    const timer = setTimeout(onDismiss, DISMISS_MS);
    return () => clearTimeout(timer);
  }, [id, onDismiss]);

  const colorFn = statusColor(type);

  // Prefix icons
  const prefixMap: Record<NotificationType, string> = {
    info: "i",
    error: "!",
    success: "*",
  };
  const prefix = prefixMap[type];

  return (
    <Box>
      <Text>{colorFn(`[${prefix}] ${message}`)}</Text>
    </Box>
  );
}
