/**
 * Classification Rules
 *
 * Read-only configuration shared by every record of a run. Built once
 * before rendering and never mutated, so records can be rendered in any
 * order without observing each other.
 */

/**
 * How field lines of one record are joined.
 * - multiline: one field per line
 * - compact: fields joined by " | "
 */
export type ItemLayout = "multiline" | "compact";

/**
 * How a link field is displayed.
 * - label: fixed label text, URL hidden behind it
 * - url: the URL itself (truncated) is the label
 */
export type LinkStyle = "label" | "url";

/**
 * Rule set consumed by the field classifier.
 */
export interface ClassificationRules {
    /** Field names whose values may become links */
    readonly linkFields: ReadonlySet<string>;

    /** Field names whose values may get a status glyph */
    readonly statusFields: ReadonlySet<string>;

    /** Lowercase status value -> glyph */
    readonly statusGlyphs: ReadonlyMap<string, string>;

    /** Base URL that completes relative link values */
    readonly linkBaseUrl?: string;

    /** Field join mode */
    readonly layout: ItemLayout;

    /** Link display mode */
    readonly linkStyle: LinkStyle;

    /** Label text used when linkStyle is "label" */
    readonly linkLabel: string;

    /** Text shown for null or missing values */
    readonly nullPlaceholder: string;

    /** Prepend a bold "Item n" heading to every record */
    readonly showItemIndex: boolean;
}

/**
 * Plain-data form of the rules, as read from configuration files or flags.
 */
export interface ClassificationRulesInput {
    readonly linkFields?: Iterable<string>;
    readonly statusFields?: Iterable<string>;
    readonly statusGlyphs?: Readonly<Record<string, string>>;
    readonly linkBaseUrl?: string;
    readonly layout?: ItemLayout;
    readonly linkStyle?: LinkStyle;
    readonly linkLabel?: string;
    readonly nullPlaceholder?: string;
    readonly showItemIndex?: boolean;
}

export const DEFAULT_LINK_FIELDS: readonly string[] = ["url", "link", "href", "website", "page"];

export const DEFAULT_STATUS_FIELDS: readonly string[] = ["status", "state", "result"];

export const DEFAULT_STATUS_GLYPHS: Readonly<Record<string, string>> = {
    success    : "✅",
    ok         : "✅",
    passed     : "✅",
    done       : "✅",
    failed     : "❌",
    failure    : "❌",
    error      : "❌",
    warning    : "⚠️",
    warn       : "⚠️",
    pending    : "⏳",
    queued     : "⏳",
    running    : "🔄",
    in_progress: "🔄",
    skipped    : "⏭️",
    cancelled  : "⏭️",
};

export const DEFAULT_LINK_LABEL = "view details";

export const DEFAULT_NULL_PLACEHOLDER = "—";

/**
 * Build a frozen rule set, filling every omitted field with its default.
 * Glyph keys are lowercased so lookups can lowercase the value only.
 *
 * @param input - Partial rules
 * @returns Complete, frozen rules
 *
 * @example
 * ```typescript
 * const rules = createClassificationRules({
 *     linkFields : ["url"],
 *     linkBaseUrl: "https://ci.example.com/builds/",
 *     layout     : "compact",
 * });
 * ```
 */
export function createClassificationRules(input: ClassificationRulesInput = {}): ClassificationRules {
    const glyphs = new Map<string, string>();
    for (const [value, glyph] of Object.entries(input.statusGlyphs ?? DEFAULT_STATUS_GLYPHS)) {
        glyphs.set(value.trim().toLowerCase(), glyph);
    }

    const rules: ClassificationRules = {
        linkFields     : new Set(input.linkFields ?? DEFAULT_LINK_FIELDS),
        statusFields   : new Set(input.statusFields ?? DEFAULT_STATUS_FIELDS),
        statusGlyphs   : glyphs,
        layout         : input.layout ?? "multiline",
        linkStyle      : input.linkStyle ?? "label",
        linkLabel      : input.linkLabel ?? DEFAULT_LINK_LABEL,
        nullPlaceholder: input.nullPlaceholder ?? DEFAULT_NULL_PLACEHOLDER,
        showItemIndex  : input.showItemIndex ?? false,
        ...(input.linkBaseUrl ? { linkBaseUrl: input.linkBaseUrl } : {}),
    };

    return Object.freeze(rules);
}

/**
 * Type guard for the item layout flag.
 */
export function isItemLayout(value: unknown): value is ItemLayout {
    return value === "multiline" || value === "compact";
}

/**
 * Type guard for the link style flag.
 */
export function isLinkStyle(value: unknown): value is LinkStyle {
    return value === "label" || value === "url";
}
