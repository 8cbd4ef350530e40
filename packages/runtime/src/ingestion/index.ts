// Ingestion module - entry point for host notifications

export {
  parseNotification,
  isEntityHandle,
  isInventoryHandle,
  isItemStackHandle,
  isPlayerHandle,
  isRobotHandle,
} from './notification.js';
