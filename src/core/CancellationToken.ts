const RUNNING = 0;
const CANCELLED = 1;

/**
 * Observer side of a cancellation flag. Backed by shared memory, so a token
 * attached inside a worker thread sees the owner's `cancel()`.
 */
export class CancellationToken {
    readonly buffer: SharedArrayBuffer;
    private readonly flag: Int32Array;

    private constructor(buffer: SharedArrayBuffer) {
        this.buffer = buffer;
        this.flag = new Int32Array(buffer);
    }

    public static attach(buffer: SharedArrayBuffer): CancellationToken {
        return new CancellationToken(buffer);
    }

    public isCancelled(): boolean {
        return Atomics.load(this.flag, 0) !== RUNNING;
    }
}

/**
 * Owner side of a cancellation flag. One source per render job; cancelling is
 * permanent.
 */
export class CancellationSource {
    readonly token: CancellationToken;
    private readonly flag: Int32Array;

    constructor() {
        const buffer = new SharedArrayBuffer(Int32Array.BYTES_PER_ELEMENT);
        this.flag = new Int32Array(buffer);
        this.token = CancellationToken.attach(buffer);
    }

    public cancel(): void {
        Atomics.store(this.flag, 0, CANCELLED);
    }
}
