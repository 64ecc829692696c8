import path from "node:path";
import {OnnxObjectDetector} from "../src/detectors/onnx-object.detector";
import {DetectionSettings} from "../src/config/detection-settings";
import {colorForLabel} from "../src/utils/label-color";

const [, , modelPathArg, imagePathArg, modeArg] = process.argv;
if (!modelPathArg || !imagePathArg) {
    console.error("Usage: tsx examples/detect-image.ts path/to/model.onnx path/to/image.jpg [letterbox|resize]");
    process.exit(1);
}

const detector = new OnnxObjectDetector({
    modelPath: path.resolve(process.cwd(), modelPathArg),
    mode: modeArg === 'resize' ? 'resize' : 'letterbox',
    settings: new DetectionSettings({ confidenceThreshold: 0.25, iouThreshold: 0.45 }),
    clip: true,
    debug: true,
});
await detector.initialize();

const { detections, width, height } = await detector.detectObjects(path.resolve(process.cwd(), imagePathArg));

console.log(`Image ${width}x${height}, ${detections.length} detections`);
for (const d of detections) {
    const box = [d.x, d.y, d.width, d.height].map(v => v.toFixed(1)).join(', ');
    console.log(`  ${d.label} (${d.confidence.toFixed(2)}) [${box}] ${colorForLabel(d.label)}`);
}
