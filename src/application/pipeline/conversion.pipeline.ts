import { JobCancelledError } from "../../domain/errors/conversion.errors";
import { ConversionContext } from "./conversion.context";
import { IConversionStep } from "./conversion.step";

export class ConversionPipeline {
    constructor(private steps: IConversionStep[]) {}

    /**
     * Runs the steps strictly in order. A step only starts after the previous
     * one resolved; the first rejection stops the run and is rethrown.
     */
    async run(initialContext: ConversionContext): Promise<ConversionContext> {
      let ctx = initialContext;
      console.log(`[ConversionPipeline] Job ${ctx.jobId}: running ${this.steps.length} steps`);
      for (let i = 0; i < this.steps.length; i++) {
        const step = this.steps[i];
        if (ctx.signal.aborted) {
          throw new JobCancelledError(ctx.jobId, step.stage, { retainedPath: ctx.workspace?.path });
        }
        console.log(`[ConversionPipeline] Job ${ctx.jobId}: step ${i + 1}/${this.steps.length} (${step.stage})`);
        try {
          ctx = await step.execute(ctx);
        } catch (error) {
          console.error(`[ConversionPipeline] Job ${ctx.jobId}: step ${i + 1} (${step.stage}) failed:`, error);
          throw error;
        }
      }
      console.log(`[ConversionPipeline] Job ${ctx.jobId}: all steps completed`);
      return ctx;
    }
}
