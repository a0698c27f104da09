/**
 * @fileoverview Card Assembler
 *
 * Builds the immutable CardDocument from rendered items. Pure: the only
 * failure is a theme outside the palette.
 *
 * @module @listcard/engine/engine/CardAssembler
 */

import {
    CARD_THEMES,
    isCardTheme,
    type CardDocument,
    type CardOptions,
    type CardTheme,
    type RenderedItem,
} from "../contracts/CardDocument.js";
import { ConfigurationError } from "../contracts/errors.js";

/**
 * Input to assembleCard().
 */
export interface AssembleCardInput extends CardOptions {
    readonly items: readonly RenderedItem[];
}

/**
 * Check a theme name against the palette.
 *
 * @param theme - Candidate theme
 * @returns The theme, narrowed
 * @throws ConfigurationError if the theme is not in the palette
 */
export function validateTheme(theme: string): CardTheme {
    if (!isCardTheme(theme)) {
        throw new ConfigurationError(
            `Invalid theme "${theme}". Expected one of: ${CARD_THEMES.join(", ")}`,
            { theme }
        );
    }
    return theme;
}

/**
 * Assemble a card document.
 *
 * Title and header text are copied verbatim. Items keep their order; none
 * are dropped, merged or reordered.
 *
 * @example
 * ```typescript
 * const card = assembleCard({
 *     title     : "Nightly builds",
 *     headerText: "**3 pipelines**",
 *     theme     : "blue",
 *     wideLayout: true,
 *     items,
 * });
 * ```
 */
export function assembleCard(input: AssembleCardInput): CardDocument {
    const theme = validateTheme(input.theme);

    const document: CardDocument = {
        title     : input.title,
        theme,
        wideLayout: input.wideLayout,
        headerText: input.headerText,
        items     : Object.freeze([...input.items]),
    };

    return Object.freeze(document);
}
