import { setImmediate as yieldToHost } from 'timers/promises';
import type { CancellationToken } from '../core/CancellationToken';
import { defaultRandom, type RandomSource } from '../core/random';
import type { SharedFrameBuffer } from './FrameBuffer';
import type { RenderPlan, RowExecutor, RowRunResult } from './RowExecutor';
import {
    RowQueue,
    RowTask,
    createRowContext,
    defaultClock,
    emptyBatchStats,
    type Clock,
    type RowContext,
} from './RowScheduler';

export interface InlineExecutorOptions {
    /** Called once per row; each row gets its own stream. */
    randomFactory?: () => RandomSource;
    clock?: Clock;
}

/**
 * Runs the row tasks on the calling thread as `workerCount` async lanes,
 * yielding to the event loop after every batch.
 */
export class InlineExecutor implements RowExecutor {
    readonly name = 'inline';
    private readonly randomFactory: () => RandomSource;
    private readonly clock: Clock;

    constructor(options: InlineExecutorOptions = {}) {
        this.randomFactory = options.randomFactory ?? (() => defaultRandom);
        this.clock = options.clock ?? defaultClock;
    }

    public async run(plan: RenderPlan, frame: SharedFrameBuffer, token: CancellationToken): Promise<RowRunResult> {
        const queue = RowQueue.create(plan.height);
        const stats = emptyBatchStats();
        const context = createRowContext(plan, frame, token, stats, this.clock);

        // Never sample on the caller's stack
        await yieldToHost();

        const laneCount = Math.max(1, Math.min(plan.config.workerCount, plan.height));
        await Promise.all(Array.from({ length: laneCount }, () => this.lane(queue, context, plan)));

        return { outcome: queue.abortReason() ?? 'completed', stats };
    }

    private async lane(queue: RowQueue, context: RowContext, plan: RenderPlan): Promise<void> {
        for (let row = queue.next(); row !== null; row = queue.next()) {
            const task = new RowTask(context, row, plan.pixelsPerFrame, this.randomFactory());

            let step = task.step();
            while (step === 'pending') {
                await yieldToHost();
                step = task.step();
            }

            if (step !== 'done') {
                queue.abort(step);
                return;
            }
            await yieldToHost();
        }
    }
}
