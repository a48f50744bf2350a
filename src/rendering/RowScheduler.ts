import * as THREE from 'three';
import { PinholeCamera, pixelSizeForSize, viewportForSize } from '../core/Camera';
import type { CancellationToken } from '../core/CancellationToken';
import type { RandomSource } from '../core/random';
import { Scene } from '../scene/Scene';
import { Logger } from '../utils/Logger';
import {
    CALIBRATION_CONFIG,
    FRAME_CONFIG,
    calculateFrameByteLength,
    targetIntervalMs,
    type RenderConfig,
} from '../utils/Constants';
import type { SharedFrameBuffer } from './FrameBuffer';
import { sampleColor, type PixelSamplerContext } from './PixelSampler';
import type { RenderPlan } from './RowExecutor';

export type Clock = () => number;

export const defaultClock: Clock = () => performance.now();

export type RowAbort = 'cancelled' | 'resized';
export type RowStep = 'pending' | 'done' | RowAbort;

export interface BatchStats {
    batches: number;
    pixels: number;
    busyMs: number;
}

export function emptyBatchStats(): BatchStats {
    return { batches: 0, pixels: 0, busyMs: 0 };
}

export function mergeBatchStats(a: BatchStats, b: BatchStats): BatchStats {
    return {
        batches: a.batches + b.batches,
        pixels: a.pixels + b.pixels,
        busyMs: a.busyMs + b.busyMs,
    };
}

// ===== ADAPTIVE THROUGHPUT =====

function atLeastOne(value: number): number {
    return Number.isFinite(value) && value >= 1 ? value : 1;
}

/**
 * Batch length that should take about `targetMs`, given that `batchLength`
 * pixels took `elapsedMs`. Never below 1, including for a zero measurement.
 */
export function nextBatchSize(batchLength: number, targetMs: number, elapsedMs: number): number {
    return atLeastOne(Math.floor(batchLength * targetMs / elapsedMs));
}

/**
 * Times a single pixel sample and derives the starting pixels-per-frame
 * estimate for every row.
 */
export function calibratePixelsPerFrame(
    sampler: PixelSamplerContext,
    targetMs: number,
    rng: RandomSource,
    clock: Clock = defaultClock
): number {
    const begin = clock();
    sampleColor(
        sampler,
        rng,
        new THREE.Vector2(...CALIBRATION_CONFIG.UV),
        new THREE.Vector2(...CALIBRATION_CONFIG.PIXEL_SIZE),
        new THREE.Vector2(...CALIBRATION_CONFIG.VIEWPORT)
    );
    const elapsed = clock() - begin;
    return atLeastOne(Math.floor(targetMs / elapsed));
}

export function createSamplerContext(scene: Scene, config: RenderConfig): PixelSamplerContext {
    return {
        scene,
        camera: PinholeCamera.fromConfig(config),
        samplesPerPixel: config.samplesPerPixel,
        maxDepth: config.maxDepth,
    };
}

// ===== ROW TASKS =====

/**
 * Everything the row tasks of one render share. Built once per thread.
 */
export interface RowContext {
    sampler: PixelSamplerContext;
    width: number;
    height: number;
    pixelSize: THREE.Vector2;
    viewport: THREE.Vector2;
    targetMs: number;
    frame: SharedFrameBuffer;
    token: CancellationToken;
    expectedByteLength: number;
    revision: number;
    stats: BatchStats;
    clock: Clock;
}

export function createRowContext(
    plan: RenderPlan,
    frame: SharedFrameBuffer,
    token: CancellationToken,
    stats: BatchStats = emptyBatchStats(),
    clock: Clock = defaultClock
): RowContext {
    const { width, height, config } = plan;
    return {
        sampler: createSamplerContext(Scene.fromDescriptor(plan.scene), config),
        width,
        height,
        pixelSize: pixelSizeForSize(width, height),
        viewport: viewportForSize(width, height),
        targetMs: targetIntervalMs(config),
        frame,
        token,
        expectedByteLength: calculateFrameByteLength(width, height),
        revision: plan.revision,
        stats,
        clock,
    };
}

/**
 * Renders one image row in batches sized to the target frame interval.
 *
 * Row 0 is the top scanline of the frame buffer and samples the top of the
 * viewport. Each `step()` computes one batch into a private buffer, then
 * flushes it under the frame lock after checking for cancellation and resize.
 */
export class RowTask {
    private readonly context: RowContext;
    private readonly row: number;
    private readonly rng: RandomSource;
    private readonly rowBuffer: Uint8Array;
    private readonly y: number;
    private readonly logger: Logger;

    private start: number = 0;
    private end: number;
    private batchSize: number;

    constructor(context: RowContext, row: number, initialBatchSize: number, rng: RandomSource) {
        this.context = context;
        this.row = row;
        this.rng = rng;
        this.rowBuffer = new Uint8Array(context.width * FRAME_CONFIG.BYTES_PER_PIXEL);
        this.y = context.height - row - 1;
        this.logger = Logger.getInstance();

        this.batchSize = atLeastOne(initialBatchSize);
        this.end = Math.min(this.batchSize, context.width);
    }

    public getBatchSize(): number {
        return this.batchSize;
    }

    public getCursor(): { start: number; end: number } {
        return { start: this.start, end: this.end };
    }

    public step(): RowStep {
        const { width, height, sampler, pixelSize, viewport, frame, token, clock } = this.context;

        if (this.start >= width) {
            return 'done';
        }

        const start = this.start;
        const end = this.end;
        const uv = new THREE.Vector2();

        const begin = clock();
        for (let column = start; column < end; column++) {
            uv.set(column / width, this.y / height);
            const color = sampleColor(sampler, this.rng, uv, pixelSize, viewport);
            this.rowBuffer.set(color, column * FRAME_CONFIG.BYTES_PER_PIXEL);
        }
        const elapsed = clock() - begin;

        this.batchSize = nextBatchSize(end - start, this.context.targetMs, elapsed);

        this.logger.row(this.row, `Flushing pixels at columns ${start}..${end}`);
        const flushed = frame.withLock((view): RowStep => {
            if (token.isCancelled()) {
                return 'cancelled';
            }
            if (view.byteLength !== this.context.expectedByteLength || view.revision !== this.context.revision) {
                return 'resized';
            }
            const offset = (this.row * width + start) * FRAME_CONFIG.BYTES_PER_PIXEL;
            view.pixels.set(
                this.rowBuffer.subarray(start * FRAME_CONFIG.BYTES_PER_PIXEL, end * FRAME_CONFIG.BYTES_PER_PIXEL),
                offset
            );
            return 'pending';
        });

        if (flushed !== 'pending') {
            return flushed;
        }

        const stats = this.context.stats;
        stats.batches++;
        stats.pixels += end - start;
        stats.busyMs += elapsed;

        // The tail is clamped to the row so the last columns are always rendered
        this.start = end;
        this.end = Math.min(end + this.batchSize, width);
        return this.start >= width ? 'done' : 'pending';
    }

    /**
     * Steps until the row is finished or aborted.
     */
    public run(): 'done' | RowAbort {
        let step = this.step();
        while (step === 'pending') {
            step = this.step();
        }
        return step;
    }
}

// ===== ROW QUEUE =====

const NEXT_ROW_INDEX = 0;
const ABORT_INDEX = 1;
const ROW_COUNT_INDEX = 2;
const QUEUE_WORDS = 3;

const ABORT_CODES: Record<RowAbort | 'none', number> = {
    none: 0,
    cancelled: 1,
    resized: 2,
};

/**
 * Hands out every row exactly once across threads. The first aborting row
 * records why; afterwards no further rows are handed out.
 */
export class RowQueue {
    readonly buffer: SharedArrayBuffer;
    private readonly words: Int32Array;

    private constructor(buffer: SharedArrayBuffer) {
        this.buffer = buffer;
        this.words = new Int32Array(buffer);
    }

    public static create(rowCount: number): RowQueue {
        const queue = new RowQueue(new SharedArrayBuffer(QUEUE_WORDS * Int32Array.BYTES_PER_ELEMENT));
        Atomics.store(queue.words, ROW_COUNT_INDEX, rowCount);
        return queue;
    }

    public static attach(buffer: SharedArrayBuffer): RowQueue {
        return new RowQueue(buffer);
    }

    public next(): number | null {
        if (Atomics.load(this.words, ABORT_INDEX) !== ABORT_CODES.none) {
            return null;
        }
        const row = Atomics.add(this.words, NEXT_ROW_INDEX, 1);
        return row < Atomics.load(this.words, ROW_COUNT_INDEX) ? row : null;
    }

    /**
     * Records the abort reason unless another row got there first.
     */
    public abort(reason: RowAbort): void {
        Atomics.compareExchange(this.words, ABORT_INDEX, ABORT_CODES.none, ABORT_CODES[reason]);
    }

    public abortReason(): RowAbort | null {
        switch (Atomics.load(this.words, ABORT_INDEX)) {
            case ABORT_CODES.cancelled:
                return 'cancelled';
            case ABORT_CODES.resized:
                return 'resized';
            default:
                return null;
        }
    }
}
