import { GenerationStateError, InvalidRequestError } from './errors';
import type { GenerationRepository, RollbackPlan } from '../generations/repository';
import type { ProgressReporter } from './progress';
import type { Generation, Operation, OperationOutcome } from './types';

// Both executors build their results here so the two paths report the same data.

export function profileOf(operation: Operation): string {
  if (operation.profile === null) {
    throw new InvalidRequestError(`'${operation.kind}' needs a system profile`);
  }
  return operation.profile;
}

export function listOutcome(generations: Generation[]): OperationOutcome {
  return {
    message: `Found ${generations.length} system generation${generations.length === 1 ? '' : 's'}`,
    data: { generations },
  };
}

export function updateOutcome(operation: Operation, before: Generation, after: Generation): OperationOutcome {
  const { mode } = operation;
  if (operation.dryRun) {
    return {
      message: 'Dry run complete - no changes made',
      data: { dryRun: true, mode, previousGeneration: before.id, currentGeneration: before.id },
    };
  }

  const data = { dryRun: false, mode, previousGeneration: before.id, currentGeneration: after.id };
  if (mode === 'test') {
    return { message: `New configuration is active until reboot; generation ${after.id} stays the boot default`, data };
  }
  if (after.id === before.id) {
    return { message: `System is up to date at generation ${after.id}`, data };
  }
  return {
    message: mode === 'boot' ? `Generation ${after.id} will be activated at next boot` : `System updated to generation ${after.id}`,
    data,
  };
}

export function switchOutcome(operation: Operation, plan: RollbackPlan): OperationOutcome {
  const verb = operation.kind === 'rollback' ? 'Rolled back' : 'Switched';
  return {
    message: `${verb} from generation ${plan.from.id} to generation ${plan.to.id}`,
    data: { previousGeneration: plan.from.id, currentGeneration: plan.to.id },
  };
}

/**
 * Shared rollback / switch-generation flow: plan against fresh history,
 * activate, then re-read history and check the system landed where asked.
 */
export async function performSwitch(repository: GenerationRepository, operation: Operation, progress: ProgressReporter, activate: (plan: RollbackPlan) => Promise<void>): Promise<OperationOutcome> {
  progress.report('analyze', 10, 'Reading system generations');
  const plan = await repository.planRollback(operation.generation);

  if (plan.to.id === plan.from.id) {
    progress.report('done', 100, `Already at generation ${plan.to.id}`);
    return {
      message: `Already at generation ${plan.to.id}`,
      data: { previousGeneration: plan.from.id, currentGeneration: plan.to.id },
    };
  }

  progress.report('plan', 30, `${operation.kind === 'rollback' ? 'Rolling back' : 'Switching'} to generation ${plan.to.id}`);
  progress.report('activation', 80, `Activating generation ${plan.to.id}`);
  await activate(plan);

  progress.report('verify', 95, 'Verifying the active generation');
  const after = await repository.current();
  if (after.id !== plan.to.id) {
    throw new GenerationStateError(`Rollback verification failed: expected generation ${plan.to.id}, system reports ${after.id}`);
  }

  progress.report('done', 100, `Now running generation ${after.id}`);
  return switchOutcome(operation, plan);
}
