import * as syncFs from "fs";
import {fileURLToPath} from "node:url";

const COCO_CLASSES_PATH = fileURLToPath(new URL('./coco.classes.txt', import.meta.url));

let cocoCatalog: ClassCatalog | null = null;

/** Ordered class names, addressed by the detector's class index. */
export class ClassCatalog {
    private constructor(private readonly entries: readonly string[]) {}

    static fromNames(names: readonly string[]): ClassCatalog {
        return new ClassCatalog([...names]);
    }

    /** One class per line; blank lines are ignored. */
    static fromFile(classesPath: string): ClassCatalog {
        const lines = syncFs.readFileSync(classesPath, 'utf8')
            .split(/\r?\n/)
            .map(s => s.trim())
            .filter(Boolean);
        return new ClassCatalog(lines);
    }

    static coco(): ClassCatalog {
        cocoCatalog ??= ClassCatalog.fromFile(COCO_CLASSES_PATH);
        return cocoCatalog;
    }

    get size(): number { return this.entries.length; }
    get names(): readonly string[] { return this.entries; }

    /** Models trained on other class counts still get a readable label. */
    labelFor(index: number): string {
        if (Number.isInteger(index) && index >= 0 && index < this.entries.length) {
            return this.entries[index];
        }
        return `cls_${index}`;
    }
}
