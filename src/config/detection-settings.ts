import { z } from "zod";

export const thresholdsSchema = z.object({
    confidenceThreshold: z.number().min(0).max(1).default(0.25),
    iouThreshold: z.number().min(0).max(1).default(0.45),
});

export type DetectionThresholds = z.infer<typeof thresholdsSchema>;

export const DEFAULT_THRESHOLDS: Readonly<DetectionThresholds> = Object.freeze(thresholdsSchema.parse({}));

/**
 * Thresholds shared between a settings surface and the detection loop.
 * Readers take a snapshot per frame, so an update lands on the next frame
 * without restarting anything. Invalid values throw a `ZodError` and leave
 * the current snapshot in place.
 */
export class DetectionSettings {
    private current: Readonly<DetectionThresholds>;

    constructor(initial?: Partial<DetectionThresholds>) {
        this.current = Object.freeze(thresholdsSchema.parse({ ...initial }));
    }

    get snapshot(): Readonly<DetectionThresholds> {
        return this.current;
    }

    update(patch: Partial<DetectionThresholds>): Readonly<DetectionThresholds> {
        this.current = Object.freeze(thresholdsSchema.parse({ ...this.current, ...patch }));
        return this.current;
    }
}
