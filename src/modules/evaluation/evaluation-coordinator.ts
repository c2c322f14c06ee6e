import type { AlertCondition } from '../../domain/entities/alert-condition.entity';
import { Logger } from '../../shared/logger';
import { PRIMARY_EVALUATORS } from './evaluators';
import { evaluateFullExit } from './full-exit.evaluator';
import type { EvaluationContext, EvaluationOutcome, EvaluationReport, Evaluator } from './evaluation.types';

// Coordinates one pass: primary evaluators in order -> FullExit on top of their outcomes
export class EvaluationCoordinator {
  private readonly logger = new Logger(EvaluationCoordinator.name);

  constructor(private readonly evaluators: readonly Evaluator[] = PRIMARY_EVALUATORS) {}

  evaluate(context: EvaluationContext): EvaluationReport {
    const outcomes: EvaluationOutcome[] = this.evaluators.map((evaluator) =>
      this.runEvaluator(evaluator, context),
    );

    const fullExit = evaluateFullExit(outcomes, context.snapshot);
    outcomes.push(fullExit ? { kind: 'FullExit', status: 'fired', alert: fullExit } : { kind: 'FullExit', status: 'clear' });

    const alerts: AlertCondition[] = [];
    for (const outcome of outcomes) {
      if (outcome.status === 'fired') alerts.push(outcome.alert);
    }

    this.logger.info(
      `Evaluation: ${outcomes.map((o) => `${o.kind}=${o.status}`).join(', ')}`,
    );
    return { outcomes, alerts };
  }

  private runEvaluator(evaluator: Evaluator, context: EvaluationContext): EvaluationOutcome {
    const missing = evaluator.missingInputs(context.snapshot);
    if (missing.length > 0) {
      const reason = `unavailable: ${missing.join(', ')}`;
      this.logger.warn(`${evaluator.kind} skipped (${reason})`);
      return { kind: evaluator.kind, status: 'skipped', reason };
    }

    const alert = evaluator.evaluate(context);
    return alert ? { kind: evaluator.kind, status: 'fired', alert } : { kind: evaluator.kind, status: 'clear' };
  }
}
