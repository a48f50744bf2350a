import { parentPort, workerData } from 'worker_threads';
import { CancellationToken } from '../../core/CancellationToken';
import { defaultRandom } from '../../core/random';
import { Logger, type LoggerSettings } from '../../utils/Logger';
import { SharedFrameBuffer, type FrameBufferDescriptor } from '../FrameBuffer';
import type { RenderPlan } from '../RowExecutor';
import { RowQueue, RowTask, createRowContext, emptyBatchStats, type BatchStats } from '../RowScheduler';

export interface RowWorkerData {
    plan: RenderPlan;
    frame: FrameBufferDescriptor;
    cancel: SharedArrayBuffer;
    queue: SharedArrayBuffer;
    logging: LoggerSettings;
}

export type RowWorkerMessage = { type: 'done'; stats: BatchStats };

/**
 * Pulls rows until the queue runs dry or some row aborts. Each thread draws
 * from its own entropy-seeded `Math.random`.
 */
export function renderRows(data: RowWorkerData): BatchStats {
    Logger.getInstance().applySettings(data.logging);
    const frame = SharedFrameBuffer.attach(data.frame);
    const token = CancellationToken.attach(data.cancel);
    const queue = RowQueue.attach(data.queue);
    const stats = emptyBatchStats();
    const context = createRowContext(data.plan, frame, token, stats);

    for (let row = queue.next(); row !== null; row = queue.next()) {
        const step = new RowTask(context, row, data.plan.pixelsPerFrame, defaultRandom).run();
        if (step !== 'done') {
            queue.abort(step);
            break;
        }
    }

    return stats;
}

if (parentPort) {
    const data: RowWorkerData = workerData;
    const message: RowWorkerMessage = { type: 'done', stats: renderRows(data) };
    parentPort.postMessage(message);
}
