import type { ExecutionContext, ExecutionResult, Intent, ParsedCommand } from '../../types';
import { mError, mExecutorFailure } from '../assistantMetrics';
import { AnalyticsExecutor } from './executors/analyticsExecutor';
import { DebtExecutor } from './executors/debtExecutor';
import { GoalExecutor } from './executors/goalExecutor';
import { ReminderExecutor } from './executors/reminderExecutor';
import { SettingsExecutor } from './executors/settingsExecutor';
import { CommandExecutor, ExecutorDeps, fail } from './executors/shared';
import { SourceExecutor } from './executors/sourceExecutor';
import { TransactionExecutor } from './executors/transactionExecutor';

export function defaultExecutors(deps: ExecutorDeps): CommandExecutor[] {
  return [
    new TransactionExecutor(deps),
    new GoalExecutor(deps),
    new SourceExecutor(deps),
    new SettingsExecutor(deps),
    new ReminderExecutor(deps),
    new AnalyticsExecutor(deps),
    new DebtExecutor(deps),
  ];
}

/**
 * Routes a parsed command to the executor that owns its intent. Store faults
 * are logged and turned into the generic localized failure.
 */
export class CommandDispatcher {
  private readonly routes = new Map<Intent, CommandExecutor>();

  constructor(executors: readonly CommandExecutor[]) {
    for (const executor of executors) {
      for (const intent of executor.intents) {
        if (this.routes.has(intent)) throw new Error(`Intent ${intent} has two executors`);
        this.routes.set(intent, executor);
      }
    }
  }

  handles(intent: Intent): boolean {
    return this.routes.has(intent);
  }

  async dispatch(command: ParsedCommand, context: ExecutionContext): Promise<ExecutionResult> {
    const executor = this.routes.get(command.intent);
    if (!executor) {
      mExecutorFailure();
      return fail(context.language, 'generic_failure', {}, { intent: command.intent });
    }
    try {
      const result = await executor.execute(command, context);
      if (!result.success) mExecutorFailure();
      return result;
    } catch (e) {
      mError();
      mExecutorFailure();
      console.error(`[ASSISTANT] ${command.intent} failed for user ${context.userId}:`, e);
      return fail(context.language, 'generic_failure', {}, { intent: command.intent });
    }
  }
}
