/**
 * Adaptive batching, row tasks and the shared row queue.
 *
 * Run with: npx tsx --test src/tests/rowScheduler.test.ts
 */

import { before, describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { CancellationSource } from '../core/CancellationToken';
import { SharedFrameBuffer } from '../rendering/FrameBuffer';
import type { RenderPlan } from '../rendering/RowExecutor';
import {
    RowQueue,
    RowTask,
    calibratePixelsPerFrame,
    createRowContext,
    createSamplerContext,
    emptyBatchStats,
    mergeBatchStats,
    nextBatchSize,
    type Clock,
} from '../rendering/RowScheduler';
import { renderRows } from '../rendering/workers/rowWorker';
import { Scene } from '../scene/Scene';
import { resolveRenderConfig, type RenderConfig } from '../utils/Constants';
import { LogLevel, Logger, type LoggerSettings } from '../utils/Logger';
import { constantRandom, pixelAt, seededRandom, steppingClock } from './helpers';

const SILENT_LOGGING: LoggerSettings = { level: LogLevel.SILENT, showRowDetails: false };

function planFor(width: number, height: number, overrides: Partial<RenderConfig> = {}): RenderPlan {
    return {
        scene: Scene.defaultDescriptor(),
        width,
        height,
        config: resolveRenderConfig({ samplesPerPixel: 1, maxDepth: 2, workerCount: 1, ...overrides }),
        pixelsPerFrame: 1,
        revision: 0,
    };
}

function taskFor(
    frame: SharedFrameBuffer,
    source: CancellationSource,
    row: number,
    initialBatchSize: number,
    clock: Clock,
    updateRate: number = 1000
) {
    const { width, height } = frame.getDimensions();
    const stats = emptyBatchStats();
    const context = createRowContext(planFor(width, height, { updateRate }), frame, source.token, stats, clock);
    return { task: new RowTask(context, row, initialBatchSize, seededRandom(row + 1)), stats };
}

before(() => {
    Logger.getInstance().setLogLevel(LogLevel.SILENT);
});

describe('nextBatchSize', () => {
    it('scales the last batch to the target interval', () => {
        assert.equal(nextBatchSize(10, 16, 8), 20);
        assert.equal(nextBatchSize(30, 16, 32), 15);
    });

    it('never drops below one', () => {
        assert.equal(nextBatchSize(5, 16, 0), 1);
        assert.equal(nextBatchSize(0, 16, 5), 1);
        assert.equal(nextBatchSize(1, 1, 1000), 1);
    });
});

describe('calibratePixelsPerFrame', () => {
    const sampler = createSamplerContext(Scene.default(), resolveRenderConfig({ samplesPerPixel: 1, maxDepth: 2 }));

    it('fits as many single-pixel samples as the interval allows', () => {
        assert.equal(calibratePixelsPerFrame(sampler, 16, constantRandom(0.5), steppingClock(2)), 8);
    });

    it('falls back to one pixel when no time was measured', () => {
        assert.equal(calibratePixelsPerFrame(sampler, 16, constantRandom(0.5), () => 0), 1);
    });
});

describe('RowTask', () => {
    it('walks the row in adaptive batches up to the last column', () => {
        const frame = SharedFrameBuffer.create(10, 2);
        // Every batch takes 1ms against a 1ms target, so the batch size holds at 4
        const { task, stats } = taskFor(frame, new CancellationSource(), 0, 4, steppingClock(1));

        assert.deepEqual(task.getCursor(), { start: 0, end: 4 });
        assert.equal(task.step(), 'pending');
        assert.deepEqual(task.getCursor(), { start: 4, end: 8 });
        assert.equal(task.step(), 'pending');
        assert.deepEqual(task.getCursor(), { start: 8, end: 10 });
        assert.equal(task.step(), 'done');
        assert.equal(task.step(), 'done');

        assert.deepEqual(stats, { batches: 3, pixels: 10, busyMs: 3 });
    });

    it('writes only its own row', () => {
        const frame = SharedFrameBuffer.create(10, 2);
        const { task } = taskFor(frame, new CancellationSource(), 0, 4, steppingClock(1));

        assert.equal(task.run(), 'done');

        const pixels = frame.snapshot();
        for (let column = 0; column < 10; column++) {
            assert.equal(pixelAt(pixels, 10, column, 0)[3], 255);
            assert.deepEqual(pixelAt(pixels, 10, column, 1), [0, 0, 0, 0]);
        }
    });

    it('renders the tail columns when the batch does not divide the width', () => {
        const frame = SharedFrameBuffer.create(7, 1);
        const { task, stats } = taskFor(frame, new CancellationSource(), 0, 3, steppingClock(1));

        assert.equal(task.step(), 'pending');
        assert.equal(task.step(), 'pending');
        assert.deepEqual(task.getCursor(), { start: 6, end: 7 });
        assert.equal(task.step(), 'done');

        assert.equal(stats.pixels, 7);
        assert.equal(pixelAt(frame.snapshot(), 7, 6, 0)[3], 255);
    });

    it('grows the batch when sampling is fast', () => {
        const frame = SharedFrameBuffer.create(10, 1);
        // 1ms per batch against a 4ms target
        const { task } = taskFor(frame, new CancellationSource(), 0, 2, steppingClock(1), 250);

        assert.equal(task.step(), 'pending');
        assert.equal(task.getBatchSize(), 8);
        assert.deepEqual(task.getCursor(), { start: 2, end: 10 });
        assert.equal(task.step(), 'done');
    });

    it('stays at one pixel per batch when the clock does not advance', () => {
        const frame = SharedFrameBuffer.create(3, 1);
        const { task, stats } = taskFor(frame, new CancellationSource(), 0, 1, () => 0);

        assert.equal(task.run(), 'done');
        assert.equal(task.getBatchSize(), 1);
        assert.equal(stats.batches, 3);
    });

    it('flushes nothing once cancelled', () => {
        const frame = SharedFrameBuffer.create(4, 1);
        const source = new CancellationSource();
        const { task, stats } = taskFor(frame, source, 0, 4, steppingClock(1));

        source.cancel();

        assert.equal(task.step(), 'cancelled');
        assert.deepEqual(Array.from(frame.snapshot()), new Array(16).fill(0));
        assert.equal(stats.batches, 0);
    });

    it('detects a resize to a different size', () => {
        const frame = SharedFrameBuffer.create(4, 1);
        const { task } = taskFor(frame, new CancellationSource(), 0, 4, steppingClock(1));

        frame.resize(2, 2);

        assert.equal(task.step(), 'resized');
        assert.deepEqual(Array.from(frame.snapshot()), new Array(16).fill(0));
    });

    it('detects a resize back to the same size', () => {
        const frame = SharedFrameBuffer.create(4, 1);
        const { task } = taskFor(frame, new CancellationSource(), 0, 4, steppingClock(1));

        frame.resize(4, 1);

        assert.equal(task.step(), 'resized');
    });
});

describe('RowQueue', () => {
    it('hands out every row once, in order', () => {
        const queue = RowQueue.create(3);
        const shared = RowQueue.attach(queue.buffer);

        assert.equal(queue.next(), 0);
        assert.equal(shared.next(), 1);
        assert.equal(queue.next(), 2);
        assert.equal(shared.next(), null);
        assert.equal(queue.abortReason(), null);
    });

    it('stops handing out rows after an abort', () => {
        const queue = RowQueue.create(5);
        queue.next();
        queue.abort('resized');

        assert.equal(queue.next(), null);
        assert.equal(queue.abortReason(), 'resized');
    });

    it('keeps the first abort reason', () => {
        const queue = RowQueue.create(5);
        queue.abort('cancelled');
        queue.abort('resized');

        assert.equal(RowQueue.attach(queue.buffer).abortReason(), 'cancelled');
    });
});

describe('renderRows', () => {
    it('renders every pixel of the frame', () => {
        const plan = planFor(4, 3);
        const frame = SharedFrameBuffer.create(4, 3);

        const stats = renderRows({
            plan,
            frame: frame.descriptor(),
            cancel: new CancellationSource().token.buffer,
            queue: RowQueue.create(3).buffer,
            logging: SILENT_LOGGING,
        });

        assert.equal(stats.pixels, 12);
        const pixels = frame.snapshot();
        for (let i = 3; i < pixels.length; i += 4) {
            assert.equal(pixels[i], 255);
        }
    });

    it('stops at the first row when cancelled up front', () => {
        const plan = planFor(4, 3);
        const frame = SharedFrameBuffer.create(4, 3);
        const source = new CancellationSource();
        const queue = RowQueue.create(3);
        source.cancel();

        const stats = renderRows({
            plan,
            frame: frame.descriptor(),
            cancel: source.token.buffer,
            queue: queue.buffer,
            logging: SILENT_LOGGING,
        });

        assert.deepEqual(stats, emptyBatchStats());
        assert.equal(queue.abortReason(), 'cancelled');
        assert.equal(queue.next(), null);
    });
});

describe('mergeBatchStats', () => {
    it('adds field by field', () => {
        assert.deepEqual(
            mergeBatchStats({ batches: 1, pixels: 10, busyMs: 2 }, { batches: 2, pixels: 5, busyMs: 1.5 }),
            { batches: 3, pixels: 15, busyMs: 3.5 }
        );
    });
});
