import { logger, toEventBridgeSchedule } from 'crm-backend-shared';
import {
  SCHEDULED_TASKS,
  buildScheduledEvent,
  findScheduledTask,
} from '../functions/scheduled/registry';

function listTasks(): void {
  for (const task of SCHEDULED_TASKS) {
    console.log(`${task.id.padEnd(26)} ${task.cron.padEnd(14)} ${toEventBridgeSchedule(task.cron).padEnd(26)} ${task.description}`);
  }
}

/**
 * Run one scheduled task outside of EventBridge.
 *
 *   run-task --list
 *   run-task generate-crm-report
 */
async function main(args: string[]): Promise<void> {
  const [taskId] = args;

  if (!taskId || taskId === '--list') {
    listTasks();
    return;
  }

  const task = findScheduledTask(taskId);
  if (!task) {
    throw new Error(`Unknown task "${taskId}". Use --list to see the available tasks.`);
  }

  const result = await task.run(buildScheduledEvent(task));
  console.log(JSON.stringify(result, null, 2));
}

main(process.argv.slice(2)).catch((error: unknown) => {
  logger.error('Scheduled task run failed', error);
  process.exitCode = 1;
});
