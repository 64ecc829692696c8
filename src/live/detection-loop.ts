import { setTimeout as sleep } from "node:timers/promises";
import {DetectionOutput, IDetector} from "../interfaces/detector.interface";
import {ImageSource} from "../types/image-source";

/** Camera or any other producer of frames. Resolves null when no frame is available. */
export interface FrameSource {
    capture(signal: AbortSignal): Promise<ImageSource | null>;
}

export type FrameResult = DetectionOutput & {
    fps: number;        // frames processed per second, refreshed about once a second
};

export type DetectionLoopOptions = {
    source: FrameSource;
    detector: IDetector;
    onResult: (result: FrameResult) => void;
    captureTimeoutMs?: number;
    idleDelayMs?: number;
    debug?: boolean;
};

const BUSY_POLL_MS = 5;

/**
 * Capture → detect → publish → sleep, one frame in flight at a time.
 *
 * A frame that arrives while another is being processed is dropped, so the
 * loop always works on the freshest frame instead of a backlog. Cancellation
 * is checked between cycles; a pass that has started runs to completion.
 */
export class DetectionLoop {
    private readonly source: FrameSource;
    private readonly detector: IDetector;
    private readonly onResult: (result: FrameResult) => void;
    private readonly captureTimeoutMs: number;
    private readonly idleDelayMs: number;
    private readonly debug: boolean;

    private processing = false;
    private frameCount = 0;
    private windowStart = Date.now();
    private fps = 0;

    constructor(options: DetectionLoopOptions) {
        this.source = options.source;
        this.detector = options.detector;
        this.onResult = options.onResult;
        this.captureTimeoutMs = options.captureTimeoutMs ?? 500;
        this.idleDelayMs = options.idleDelayMs ?? 100;
        this.debug = options.debug ?? false;
    }

    get isProcessing(): boolean { return this.processing; }

    log(text: string) {
        if (this.debug) {
            console.log(text);
        }
    }

    async run(signal: AbortSignal): Promise<void> {
        this.frameCount = 0;
        this.windowStart = Date.now();
        this.fps = 0;
        this.log("Detection loop started");
        try {
            while (!signal.aborted) {
                if (this.processing) {
                    await sleep(BUSY_POLL_MS, undefined, { signal });
                    continue;
                }

                const frame = await this.captureWithTimeout(signal);
                if (frame !== null && !signal.aborted) {
                    await this.processFrame(frame);
                }

                await sleep(this.idleDelayMs, undefined, { signal });
            }
        } catch (e) {
            if (!signal.aborted) throw e;
        }
        this.log("Detection loop stopped");
    }

    /**
     * Runs one frame through the detector and publishes the result.
     * Returns null when another frame is still in flight (the frame is
     * dropped) or when detection failed.
     */
    async processFrame(frame: ImageSource): Promise<FrameResult | null> {
        if (this.processing) {
            this.log("Frame dropped: previous frame still processing");
            return null;
        }

        this.processing = true;
        try {
            const output = await this.detector.detectObjects(frame);
            const result: FrameResult = { ...output, fps: this.tick() };
            this.onResult(result);
            return result;
        } catch (e) {
            console.error("Detection error:", e);
            return null;
        } finally {
            this.processing = false;
        }
    }

    private tick(): number {
        this.frameCount++;
        const now = Date.now();
        const elapsed = (now - this.windowStart) / 1000;
        if (elapsed >= 1) {
            this.fps = this.frameCount / elapsed;
            this.frameCount = 0;
            this.windowStart = now;
        }
        return this.fps;
    }

    // A stalled capture must not block the loop: on timeout the pending
    // capture is aborted and the cycle continues without a frame.
    private async captureWithTimeout(signal: AbortSignal): Promise<ImageSource | null> {
        const controller = new AbortController();
        const forwardAbort = () => controller.abort(signal.reason);
        signal.addEventListener('abort', forwardAbort, { once: true });

        let timer: NodeJS.Timeout | undefined;
        const timedOut = new Promise<null>((resolve) => {
            timer = setTimeout(() => {
                this.log(`Capture timed out after ${this.captureTimeoutMs}ms`);
                controller.abort(new Error('Capture timed out'));
                resolve(null);
            }, this.captureTimeoutMs);
        });

        // after an abort, a late rejection from the source only means "no frame"
        const captured = this.source.capture(controller.signal).catch((err: unknown) => {
            if (controller.signal.aborted) return null;
            throw err;
        });

        try {
            return await Promise.race([captured, timedOut]);
        } catch (e) {
            console.error("Capture error:", e);
            return null;
        } finally {
            clearTimeout(timer);
            signal.removeEventListener('abort', forwardAbort);
        }
    }
}
