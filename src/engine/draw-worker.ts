/**
 * Piscina worker thread for draw computation.
 * Receives a plain-data snapshot, returns the draw or a serialized failure.
 */

import { DrawTask, DrawTaskResult, runDrawTask } from './drawer';

export default function computeDraw(task: DrawTask): DrawTaskResult {
  return runDrawTask(task);
}
