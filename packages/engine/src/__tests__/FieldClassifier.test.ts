/**
 * @fileoverview Unit tests for the field classifier
 *
 * Tests cover:
 * - Link detection (absolute, relative with/without base URL)
 * - URL joining and truncation
 * - Status glyph lookup (case-insensitive)
 * - Plain fallback and value formatting
 * - Priority order between kinds
 *
 * @module @listcard/engine/__tests__/FieldClassifier
 */

import { describe, it, expect } from "vitest";
import {
    classifyField,
    renderField,
    resolveLink,
    joinUrl,
    truncateUrl,
    formatValue,
} from "../classifier/FieldClassifier.js";
import { createClassificationRules } from "../contracts/ClassificationRules.js";

describe("joinUrl", () => {
    // Scenario: Base with trailing slash and value with leading slash
    it("should join without doubling the slash", () => {
        expect(joinUrl("https://ex.com/items/", "/42")).toBe("https://ex.com/items/42");
    });

    // Scenario: Base without trailing slash
    it("should add the missing slash to the base", () => {
        expect(joinUrl("https://ex.com/items", "42")).toBe("https://ex.com/items/42");
    });

    // Scenario: Several leading slashes on the value
    it("should strip every leading slash of the value", () => {
        expect(joinUrl("https://ex.com/", "//a/b")).toBe("https://ex.com/a/b");
    });
});

describe("resolveLink", () => {
    // Scenario: Absolute values ignore the base URL
    it("should keep absolute http(s) values as they are", () => {
        expect(resolveLink("https://x.com/a", "https://base.com/")).toBe("https://x.com/a");
        expect(resolveLink("http://x.com", undefined)).toBe("http://x.com");
    });

    // Scenario: Relative value without base
    it("should return null for relative values without a base URL", () => {
        expect(resolveLink("/42", undefined)).toBeNull();
    });

    // Scenario: Numeric id with base
    it("should join numeric values onto the base URL", () => {
        expect(resolveLink(42, "https://ex.com/items")).toBe("https://ex.com/items/42");
    });

    // Scenario: Empty and non-scalar values never become links
    it("should return null for empty strings, null and objects", () => {
        expect(resolveLink("  ", "https://ex.com/")).toBeNull();
        expect(resolveLink(null, "https://ex.com/")).toBeNull();
        expect(resolveLink({ id: 1 }, "https://ex.com/")).toBeNull();
    });

    // Scenario: Surrounding whitespace around an absolute URL
    it("should trim an absolute URL instead of joining it to the base", () => {
        expect(resolveLink(" https://x.com ", "https://ex.com/items/")).toBe("https://x.com");
        expect(resolveLink("\thttps://x.com", undefined)).toBe("https://x.com");
    });
});

describe("truncateUrl", () => {
    // Scenario: Short URL shown whole
    it("should keep URLs shorter than 30 characters", () => {
        const url = "https://example.com/abcdefghi"; // 29 chars
        expect(truncateUrl(url)).toBe(url);
    });

    // Scenario: 30+ character URL truncated to 27 + "..."
    it("should truncate URLs of 30 characters or more", () => {
        const url = "https://example.com/abcdefghij"; // 30 chars
        expect(truncateUrl(url)).toBe("https://example.com/abcdefg...");
        expect(truncateUrl(url)).toHaveLength(30);
    });
});

describe("formatValue", () => {
    // Scenario: Null and missing values use the placeholder
    it("should render null and undefined as the placeholder", () => {
        expect(formatValue(null, "—")).toBe("—");
        expect(formatValue(undefined, "n/a")).toBe("n/a");
    });

    // Scenario: Scalars and nested values
    it("should stringify scalars and serialize nested structures", () => {
        expect(formatValue("text", "—")).toBe("text");
        expect(formatValue(3.5, "—")).toBe("3.5");
        expect(formatValue(false, "—")).toBe("false");
        expect(formatValue([1, "a"], "—")).toBe("[1,\"a\"]");
        expect(formatValue({ a: 1 }, "—")).toBe("{\"a\":1}");
    });

    // Scenario: Empty string is a value, not a missing one
    it("should keep empty strings as they are", () => {
        expect(formatValue("", "—")).toBe("");
    });
});

describe("classifyField", () => {
    const rules = createClassificationRules();

    // Scenario: Absolute link in a link field
    it("should classify an absolute URL in a link field as a link", () => {
        expect(classifyField("url", "https://x.com", rules)).toEqual({
            kind: "link",
            key : "url",
            url : "https://x.com",
        });
    });

    // Scenario: Absolute link wins regardless of base URL configuration
    it("should use the absolute value even when a base URL is configured", () => {
        const withBase = createClassificationRules({ linkBaseUrl: "https://base.com/" });
        expect(classifyField("link", "http://y.org/p", withBase)).toEqual({
            kind: "link",
            key : "link",
            url : "http://y.org/p",
        });
    });

    // Scenario: Relative value without base falls back to plain
    it("should classify a relative link value as plain without a base URL", () => {
        expect(classifyField("url", "/42", rules)).toEqual({
            kind : "plain",
            key  : "url",
            value: "/42",
        });
    });

    // Scenario: Relative value resolved against the base
    it("should resolve a relative link value against the base URL", () => {
        const withBase = createClassificationRules({ linkBaseUrl: "https://ex.com/items/" });
        expect(classifyField("url", "/42", withBase)).toEqual({
            kind: "link",
            key : "url",
            url : "https://ex.com/items/42",
        });
    });

    // Scenario: URL in a non-link field stays plain
    it("should not treat URLs in other fields as links", () => {
        expect(classifyField("homepage", "https://x.com", rules).kind).toBe("plain");
    });

    // Scenario: Status glyph regardless of case
    it("should match status values case-insensitively and keep the original casing", () => {
        expect(classifyField("status", "Success", rules)).toEqual({
            kind : "status",
            key  : "status",
            value: "Success",
            glyph: "✅",
        });
        expect(classifyField("status", "FAILED", rules)).toMatchObject({ kind: "status", glyph: "❌" });
    });

    // Scenario: Unknown status value falls through
    it("should classify unmatched status values as plain", () => {
        expect(classifyField("status", "mystery", rules).kind).toBe("plain");
    });

    // Scenario: Glyph values in non-status fields stay plain
    it("should not add glyphs outside the status fields", () => {
        expect(classifyField("name", "success", rules).kind).toBe("plain");
    });

    // Scenario: Non-string status values stay plain
    it("should only consider string values for status glyphs", () => {
        expect(classifyField("status", 200, rules)).toEqual({ kind: "plain", key: "status", value: 200 });
    });

    // Scenario: A field in both sets is a link first
    it("should give link classification priority over status", () => {
        const both = createClassificationRules({
            linkFields  : ["result"],
            statusFields: ["result"],
            linkBaseUrl : "https://ex.com/",
        });
        expect(classifyField("result", "success", both)).toEqual({
            kind: "link",
            key : "result",
            url : "https://ex.com/success",
        });
    });

    // Scenario: Custom glyph map keys are lowercased
    it("should lowercase custom glyph keys", () => {
        const custom = createClassificationRules({ statusGlyphs: { Green: "🟢" } });
        expect(classifyField("status", "GREEN", custom)).toMatchObject({ kind: "status", glyph: "🟢" });
    });
});

describe("renderField", () => {
    // Scenario: Label-style link
    it("should render links with the fixed label by default", () => {
        const rules = createClassificationRules();
        expect(renderField({ kind: "link", key: "url", url: "https://x.com" }, rules))
            .toBe("url: [view details](https://x.com)");
    });

    // Scenario: URL-style link with truncation
    it("should render the truncated URL as the label in url style", () => {
        const rules = createClassificationRules({ linkStyle: "url" });
        const url = "https://example.com/reports/2025/summary";
        expect(renderField({ kind: "link", key: "url", url }, rules))
            .toBe(`url: [https://example.com/reports...](${url})`);
    });

    // Scenario: Custom label text
    it("should use a custom link label", () => {
        const rules = createClassificationRules({ linkLabel: "open" });
        expect(renderField({ kind: "link", key: "href", url: "https://x.com" }, rules))
            .toBe("href: [open](https://x.com)");
    });

    // Scenario: Status line
    it("should render status fields with the glyph before the value", () => {
        const rules = createClassificationRules();
        expect(renderField({ kind: "status", key: "status", value: "Success", glyph: "✅" }, rules))
            .toBe("status: ✅ Success");
    });

    // Scenario: Null plain value
    it("should render null plain values with the placeholder", () => {
        const rules = createClassificationRules();
        expect(renderField({ kind: "plain", key: "owner", value: null }, rules)).toBe("owner: —");
    });
});
