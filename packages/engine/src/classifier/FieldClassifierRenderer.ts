/**
 * @fileoverview Field Classifier Renderer
 *
 * The default Renderer: classifies every field of a record in the record's
 * own key order and joins the resulting lines.
 *
 * @module @listcard/engine/classifier/FieldClassifierRenderer
 */

import type { Renderer } from "../contracts/Renderer.js";
import type { ListRecord } from "../contracts/ListRecord.js";
import {
    createClassificationRules,
    type ClassificationRules,
} from "../contracts/ClassificationRules.js";
import { classifyField, renderField } from "./FieldClassifier.js";

/**
 * Field Classifier Renderer
 *
 * @example
 * ```typescript
 * const renderer = new FieldClassifierRenderer(
 *     createClassificationRules({ layout: "compact" })
 * );
 *
 * renderer.render({ name: "A", url: "https://x.com", status: "success" }, 0, []);
 * // "name: A | url: [view details](https://x.com) | status: ✅ success"
 * ```
 */
export class FieldClassifierRenderer implements Renderer {
    readonly id          = "field-classifier";
    readonly description = "Renders each field as a link, a status or a plain value";

    private readonly rules: ClassificationRules;

    constructor(rules: ClassificationRules = createClassificationRules()) {
        this.rules = rules;
    }

    /**
     * Render one record.
     *
     * @param record - The record to render
     * @param index - Zero-based record position (used for the optional heading)
     * @returns Field lines joined per the layout rule
     */
    render(record: ListRecord, index: number): string {
        const lines: string[] = [];

        if (this.rules.showItemIndex) {
            lines.push(`**Item ${index + 1}**`);
        }

        for (const [key, value] of Object.entries(record)) {
            lines.push(renderField(classifyField(key, value, this.rules), this.rules));
        }

        return lines.join(this.rules.layout === "compact" ? " | " : "\n");
    }
}
