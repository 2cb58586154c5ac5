/**
 * Data Structures
 */

export {
  AdaptablePriorityQueue,
  compareNumbers,
  type KeyCompare,
  type QueueHandle,
} from "./adaptable-priority-queue";
