import { Logger } from './Logger';
import type { BatchStats } from '../rendering/RowScheduler';

export interface PerformanceStats {
    frameTime: {
        current: number;
        average: number;
        min: number;
        max: number;
    };
    throughput: {
        batches: number;
        pixels: number;
        busyMs: number;
        /** Pixels per millisecond of sampling, summed over all lanes. */
        pixelsPerMs: number;
        averageBatchMs: number;
    };
}

/**
 * 📊 PerformanceMonitor - Render timing
 *
 * Tracks:
 * - Full-frame render time (min, max, average)
 * - Batch throughput of the row tasks
 */
export class PerformanceMonitor {
    private logger: Logger;

    // ===== PERFORMANCE DATA =====
    private frameTimes: number[] = [];
    private maxFrameHistory: number = 60;
    private batches: BatchStats = { batches: 0, pixels: 0, busyMs: 0 };

    constructor(maxFrameHistory: number = 60) {
        this.logger = Logger.getInstance();
        this.maxFrameHistory = maxFrameHistory;
    }

    /**
     * ⏱️ Record the duration of one completed render
     */
    public recordFrameTime(frameTime: number): void {
        // A zero duration is a measurement artifact, not a frame
        if (frameTime > 0) {
            this.frameTimes.push(frameTime);

            if (this.frameTimes.length > this.maxFrameHistory) {
                this.frameTimes.shift();
            }
        }
    }

    /**
     * 🧵 Accumulate the batch statistics of one render, finished or not
     */
    public recordBatchStats(stats: BatchStats): void {
        this.batches = {
            batches: this.batches.batches + stats.batches,
            pixels: this.batches.pixels + stats.pixels,
            busyMs: this.batches.busyMs + stats.busyMs,
        };
    }

    public getStats(): PerformanceStats {
        const times = this.frameTimes;
        const current = times.length > 0 ? times[times.length - 1] : 0;
        const average = times.length > 0
            ? times.reduce((a, b) => a + b, 0) / times.length
            : 0;

        const { batches, pixels, busyMs } = this.batches;

        return {
            frameTime: {
                current,
                average,
                min: times.length > 0 ? Math.min(...times) : 0,
                max: times.length > 0 ? Math.max(...times) : 0,
            },
            throughput: {
                batches,
                pixels,
                busyMs,
                pixelsPerMs: busyMs > 0 ? pixels / busyMs : 0,
                averageBatchMs: batches > 0 ? busyMs / batches : 0,
            },
        };
    }

    /**
     * 📋 Log a one-line summary per aspect
     */
    public logSummary(): void {
        const stats = this.getStats();

        this.logger.stats(
            `Frame time: ${stats.frameTime.current.toFixed(1)}ms ` +
            `(avg ${stats.frameTime.average.toFixed(1)}ms, ` +
            `min ${stats.frameTime.min.toFixed(1)}ms, max ${stats.frameTime.max.toFixed(1)}ms)`
        );
        this.logger.stats(
            `Batches: ${stats.throughput.batches} (avg ${stats.throughput.averageBatchMs.toFixed(2)}ms), ` +
            `${stats.throughput.pixels} pixels at ${stats.throughput.pixelsPerMs.toFixed(1)} px/ms`
        );
    }

    public reset(): void {
        this.frameTimes = [];
        this.batches = { batches: 0, pixels: 0, busyMs: 0 };
    }
}
