import path from 'path';
import { Worker } from 'worker_threads';
import type { CancellationToken } from '../core/CancellationToken';
import { Logger } from '../utils/Logger';
import type { SharedFrameBuffer } from './FrameBuffer';
import type { RenderPlan, RowExecutor, RowRunResult } from './RowExecutor';
import { RowQueue, emptyBatchStats, mergeBatchStats, type BatchStats } from './RowScheduler';
import type { RowWorkerData, RowWorkerMessage } from './workers/rowWorker';

/**
 * Worker entry beside this file, with the same extension: `.ts` when running
 * from sources through tsx, `.js` from dist.
 */
export function defaultWorkerFile(): string {
    return path.join(__dirname, 'workers', `rowWorker${path.extname(__filename)}`);
}

/**
 * Worker threads do not inherit tsx's loader hooks, so a `.ts` entry is
 * started from a small CommonJS bootstrap that registers tsx first.
 */
export function typeScriptBootstrap(workerFile: string): string {
    const tsx = require.resolve('tsx/cjs/api');
    return [
        `require(${JSON.stringify(tsx)}).register();`,
        `require(${JSON.stringify(workerFile)});`,
    ].join('\n');
}

interface SpawnedWorker {
    worker: Worker;
    finished: Promise<BatchStats>;
}

/**
 * Runs the row tasks across `workerCount` worker threads sharing the frame
 * buffer, cancellation flag and row queue through shared memory.
 */
export class ThreadedExecutor implements RowExecutor {
    readonly name = 'threaded';
    private readonly workerFile: string;
    private logger: Logger;

    constructor(workerFile: string = defaultWorkerFile()) {
        this.workerFile = workerFile;
        this.logger = Logger.getInstance();
    }

    public async run(plan: RenderPlan, frame: SharedFrameBuffer, token: CancellationToken): Promise<RowRunResult> {
        const queue = RowQueue.create(plan.height);
        const data: RowWorkerData = {
            plan,
            frame: frame.descriptor(),
            cancel: token.buffer,
            queue: queue.buffer,
            logging: this.logger.getSettings(),
        };

        const workerCount = Math.max(1, Math.min(plan.config.workerCount, plan.height));
        this.logger.debug(`Spawning ${workerCount} row workers`);
        const spawned = Array.from({ length: workerCount }, (_, index) => this.spawn(data, index));

        let results: BatchStats[];
        try {
            results = await Promise.all(spawned.map(s => s.finished));
        } catch (error) {
            // Stop the surviving workers before reporting, so nothing outlives the job
            queue.abort('cancelled');
            await Promise.all(spawned.map(s => s.worker.terminate()));
            throw error;
        }

        return {
            outcome: queue.abortReason() ?? 'completed',
            stats: results.reduce(mergeBatchStats, emptyBatchStats()),
        };
    }

    private spawn(data: RowWorkerData, index: number): SpawnedWorker {
        const options = { workerData: data, name: `row-worker-${index}` };
        const worker = path.extname(this.workerFile) === '.ts'
            ? new Worker(typeScriptBootstrap(this.workerFile), { ...options, eval: true })
            : new Worker(this.workerFile, options);

        const finished = new Promise<BatchStats>((resolve, reject) => {
            let stats: BatchStats | null = null;

            worker.on('message', (message: RowWorkerMessage) => {
                if (message.type === 'done') {
                    stats = message.stats;
                }
            });
            worker.on('error', reject);
            worker.on('exit', code => {
                if (code !== 0) {
                    reject(new Error(`Row worker ${index} exited with code ${code}`));
                } else if (stats === null) {
                    reject(new Error(`Row worker ${index} exited without reporting`));
                } else {
                    resolve(stats);
                }
            });
        });

        return { worker, finished };
    }
}
