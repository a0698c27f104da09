/**
 * Card Document Contract
 *
 * The assembled artifact handed to a delivery adapter. Immutable once built:
 * the body holds one item per input record, in input order.
 */

/**
 * Header color templates accepted by the card renderer.
 */
export const CARD_THEMES = [
    "carmine",
    "orange",
    "wathet",
    "turquoise",
    "green",
    "yellow",
    "red",
    "violet",
    "purple",
    "indigo",
    "grey",
    "default",
    "blue",
] as const;

export type CardTheme = (typeof CARD_THEMES)[number];

export const DEFAULT_CARD_THEME: CardTheme = "blue";

/**
 * Type guard for card themes.
 *
 * @param value - Candidate theme name
 * @returns True if the value is in the palette
 */
export function isCardTheme(value: unknown): value is CardTheme {
    return typeof value === "string" && (CARD_THEMES as readonly string[]).includes(value);
}

/**
 * One rendered record.
 */
export interface RenderedItem {
    /** Zero-based position of the source record */
    readonly index: number;

    /** Item text (lark markdown), or the diagnostic placeholder */
    readonly content: string;

    /** True when content is the placeholder for a render fault */
    readonly failed: boolean;

    /** Fault kind and message when failed */
    readonly error?: string;
}

/**
 * The assembled card.
 */
export interface CardDocument {
    /** Plain-text card title */
    readonly title: string;

    /** Header color template */
    readonly theme: CardTheme;

    /** Wide-screen layout flag */
    readonly wideLayout: boolean;

    /** Lark-markdown block shown above the items */
    readonly headerText: string;

    /** Body items, in input order */
    readonly items: readonly RenderedItem[];
}

/**
 * Presentation options a caller chooses for a card.
 */
export interface CardOptions {
    readonly title: string;
    readonly headerText: string;
    readonly theme: string;
    readonly wideLayout: boolean;
}
