import { ITask, TaskResult } from '../types/task.types';
import { BatchResult } from '../types/rename.types';
import { errorMessage } from '../utils/errors.util';

export class TaskRunner {
  /**
   * Execute a task, print its summary and hand back the result.
   * Errors the task does not handle itself are turned into a failed result.
   */
  async run(task: ITask): Promise<TaskResult> {
    console.log(`\n[${new Date().toISOString()}] Starting ${task.name}...`);

    let result: TaskResult;
    try {
      result = await task.execute();
    } catch (error) {
      result = { taskName: task.name, success: false, message: errorMessage(error) };
    }

    if (result.data) {
      this.printSummary(result.data);
    }

    if (result.success) {
      console.log(result.message);
    } else {
      console.error(`${task.name} failed: ${result.message}`);
    }

    return result;
  }

  printSummary(data: BatchResult): void {
    console.log('\n' + '='.repeat(60));
    console.log('=== Rename Results ===');
    console.log(`Scanned: ${data.scanned}`);
    console.log(`Renamed: ${data.renamed}`);
    if (data.planned > 0) {
      console.log(`Planned (dry run): ${data.planned}`);
    }
    console.log(`Unchanged: ${data.unchanged}`);
    console.log(`Skipped: ${data.skipped}`);
    console.log(`Errors: ${data.failed}`);
    if (data.aborted) {
      console.log('Aborted before renaming.');
    }
    console.log('='.repeat(60) + '\n');
  }
}
