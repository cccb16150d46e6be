import type { Logger } from 'pino';

type Undo = () => Promise<unknown>;

/**
 * Collects compensating actions for a multi-step operation and replays them
 * in reverse when a later step fails.
 */
export class CompensationStack {
     private readonly steps: Array<{ label: string; undo: Undo }> = [];

     constructor(private readonly log: Logger) {}

     push(label: string, undo: Undo): void {
          this.steps.push({ label, undo });
     }

     get size(): number {
          return this.steps.length;
     }

     async unwind(): Promise<void> {
          while (this.steps.length > 0) {
               const step = this.steps.pop();
               if (!step) break;
               try {
                    await step.undo();
               } catch (err) {
                    // Compensation failures leave the entry for reconciliation
                    this.log.error({ err, step: step.label }, 'Compensating action failed');
               }
          }
     }
}
