import { ConfigError } from '../core/errors';
import { FRAME_CONFIG, calculateFrameByteLength } from '../utils/Constants';

/**
 * Everything a worker thread needs to attach to the same frame buffer.
 */
export interface FrameBufferDescriptor {
    header: SharedArrayBuffer;
    pixels: SharedArrayBuffer;
}

/**
 * What a lock holder sees. `byteLength` and `revision` are the current values
 * from the shared header; `pixels` is this copy's pixel storage and is stale
 * once a resize happened.
 */
export interface FrameView {
    pixels: Uint8Array;
    byteLength: number;
    revision: number;
}

/**
 * RGBA8 surface shared between the host and the render workers.
 *
 * The header holds a mutex word, the current byte length and a revision that
 * is bumped on every resize. Pixels live in their own shared buffer, replaced
 * on resize.
 */
export class SharedFrameBuffer {
    private readonly headerBuffer: SharedArrayBuffer;
    private readonly header: Int32Array;
    private pixelBuffer: SharedArrayBuffer;
    private pixels: Uint8Array;

    private width: number;
    private height: number;

    private constructor(descriptor: FrameBufferDescriptor, width: number, height: number) {
        this.headerBuffer = descriptor.header;
        this.header = new Int32Array(descriptor.header);
        this.pixelBuffer = descriptor.pixels;
        this.pixels = new Uint8Array(descriptor.pixels);
        this.width = width;
        this.height = height;
    }

    public static create(width: number, height: number): SharedFrameBuffer {
        assertSize(width, height);

        const header = new SharedArrayBuffer(FRAME_CONFIG.HEADER_WORDS * Int32Array.BYTES_PER_ELEMENT);
        const pixels = new SharedArrayBuffer(calculateFrameByteLength(width, height));
        const frame = new SharedFrameBuffer({ header, pixels }, width, height);
        Atomics.store(frame.header, FRAME_CONFIG.BYTE_LENGTH_INDEX, pixels.byteLength);
        return frame;
    }

    /**
     * View onto a buffer created elsewhere, typically inside a worker thread.
     * Dimensions are unknown to an attached copy and report as 0.
     */
    public static attach(descriptor: FrameBufferDescriptor): SharedFrameBuffer {
        return new SharedFrameBuffer(descriptor, 0, 0);
    }

    public descriptor(): FrameBufferDescriptor {
        return { header: this.headerBuffer, pixels: this.pixelBuffer };
    }

    public getDimensions(): { width: number; height: number } {
        return { width: this.width, height: this.height };
    }

    public getByteLength(): number {
        return Atomics.load(this.header, FRAME_CONFIG.BYTE_LENGTH_INDEX);
    }

    public getRevision(): number {
        return Atomics.load(this.header, FRAME_CONFIG.REVISION_INDEX);
    }

    // ===== LOCKING =====

    private lock(): void {
        while (Atomics.compareExchange(
            this.header, FRAME_CONFIG.LOCK_INDEX, FRAME_CONFIG.UNLOCKED, FRAME_CONFIG.LOCKED
        ) !== FRAME_CONFIG.UNLOCKED) {
            Atomics.wait(this.header, FRAME_CONFIG.LOCK_INDEX, FRAME_CONFIG.LOCKED);
        }
    }

    private unlock(): void {
        Atomics.store(this.header, FRAME_CONFIG.LOCK_INDEX, FRAME_CONFIG.UNLOCKED);
        Atomics.notify(this.header, FRAME_CONFIG.LOCK_INDEX, 1);
    }

    /**
     * Runs `fn` with exclusive access. The lock is released on every exit
     * path, including a throw from `fn`.
     */
    public withLock<T>(fn: (view: FrameView) => T): T {
        this.lock();
        try {
            return fn({
                pixels: this.pixels,
                byteLength: Atomics.load(this.header, FRAME_CONFIG.BYTE_LENGTH_INDEX),
                revision: Atomics.load(this.header, FRAME_CONFIG.REVISION_INDEX),
            });
        } finally {
            this.unlock();
        }
    }

    // ===== HOST OPERATIONS =====

    /**
     * Replaces the pixel storage with a zeroed buffer of the new size. Workers
     * bound to the old size notice on their next flush.
     */
    public resize(newWidth: number, newHeight: number): void {
        assertSize(newWidth, newHeight);

        this.withLock(() => {
            this.pixelBuffer = new SharedArrayBuffer(calculateFrameByteLength(newWidth, newHeight));
            this.pixels = new Uint8Array(this.pixelBuffer);
            this.width = newWidth;
            this.height = newHeight;
            Atomics.store(this.header, FRAME_CONFIG.BYTE_LENGTH_INDEX, this.pixelBuffer.byteLength);
            Atomics.add(this.header, FRAME_CONFIG.REVISION_INDEX, 1);
        });
    }

    /**
     * Copy of the current pixels, taken under the lock.
     */
    public snapshot(): Uint8Array {
        return this.withLock(view => view.pixels.slice());
    }
}

function assertSize(width: number, height: number): void {
    if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
        throw new ConfigError(`Invalid frame size ${width}x${height}`);
    }
}
