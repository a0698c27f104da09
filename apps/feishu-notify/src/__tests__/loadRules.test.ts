/**
 * @fileoverview Unit tests for the rules loader
 *
 * @module feishu-notify/__tests__/loadRules
 */

import { describe, it, expect, vi, beforeAll, afterAll } from "vitest";
import { mkdtempSync, writeFileSync, rmSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { ConfigurationError } from "@listcard/engine";
import {
    getDefaultRulesPath,
    loadRulesFile,
    loadRulesFileWithFallback,
    mergeRules,
    resolveRules,
} from "../config/loadRules.js";
import { parseArgs } from "../cli/parseArgs.js";

/**
 * Create a mock logger for testing.
 */
function createMockLogger() {
    return {
        debug: vi.fn(),
        info : vi.fn(),
        warn : vi.fn(),
        error: vi.fn(),
    };
}

describe("loadRules", () => {
    let dir: string;

    function writeRules(name: string, content: string): string {
        const file = join(dir, name);
        writeFileSync(file, content);
        return file;
    }

    beforeAll(() => {
        dir = mkdtempSync(join(tmpdir(), "listcard-rules-"));
    });

    afterAll(() => {
        rmSync(dir, { recursive: true, force: true });
    });

    describe("loadRulesFile", () => {
        // Scenario: Bundled rules file
        it("should load the bundled rules file", () => {
            const rules = loadRulesFile(getDefaultRulesPath());

            expect(rules.linkFields).toEqual(["url", "link", "href"]);
            expect(rules.statusFields).toEqual(["status", "state", "result"]);
            expect(rules.statusGlyphs?.success).toBe("✅");
            expect(rules.linkLabel).toBe("view details");
            expect(rules.linkBaseUrl).toBeUndefined();
        });

        // Scenario: Every supported key
        it("should read every supported key", () => {
            const file = writeRules("full.yml", [
                "linkFields: [page]",
                "statusFields: [outcome]",
                "statusGlyphs:",
                "  green: \"🟢\"",
                "linkBaseUrl: https://ex.com/items/",
                "linkLabel: open",
                "nullPlaceholder: n/a",
            ].join("\n"));

            expect(loadRulesFile(file)).toEqual({
                linkFields     : ["page"],
                statusFields   : ["outcome"],
                statusGlyphs   : { green: "🟢" },
                linkBaseUrl    : "https://ex.com/items/",
                linkLabel      : "open",
                nullPlaceholder: "n/a",
            });
        });

        // Scenario: Empty file
        it("should treat an empty file as no overrides", () => {
            expect(loadRulesFile(writeRules("empty.yml", ""))).toEqual({});
        });

        // Scenario: Wrong value types
        it("should reject a non-list linkFields", () => {
            const file = writeRules("bad-list.yml", "linkFields: url\n");

            expect(() => loadRulesFile(file)).toThrow(ConfigurationError);
            expect(() => loadRulesFile(file)).toThrow(/'linkFields' must be a list of strings/);
        });

        it("should reject non-string glyphs", () => {
            const file = writeRules("bad-glyph.yml", "statusGlyphs:\n  ok: 1\n");

            expect(() => loadRulesFile(file)).toThrow(/'statusGlyphs.ok' must be a string/);
        });

        it("should reject a top-level list", () => {
            const file = writeRules("list.yml", "- url\n- link\n");

            expect(() => loadRulesFile(file)).toThrow(/expected a mapping/);
        });

        // Scenario: Unparsable YAML
        it("should reject malformed YAML", () => {
            const file = writeRules("garbage.yml", "linkFields: [unclosed\n");

            expect(() => loadRulesFile(file)).toThrow(ConfigurationError);
        });

        // Scenario: Missing file
        it("should reject a missing file", () => {
            expect(() => loadRulesFile(join(dir, "missing.yml"))).toThrow(/Rules file not found/);
        });
    });

    describe("loadRulesFileWithFallback", () => {
        it("should warn and return no overrides when the file is unusable", () => {
            const logger = createMockLogger();

            const rules = loadRulesFileWithFallback(join(dir, "missing.yml"), logger);

            expect(rules).toEqual({});
            expect(logger.warn).toHaveBeenCalledTimes(1);
        });
    });

    describe("mergeRules", () => {
        // Scenario: Flags override file values
        it("should let command-line flags win over file values", () => {
            const rules = mergeRules(
                { linkFields: ["page"], linkLabel: "open", nullPlaceholder: "n/a" },
                parseArgs(["--link-fields", "url", "--compact"])
            );

            expect([...rules.linkFields]).toEqual(["url"]);
            expect(rules.linkLabel).toBe("open");
            expect(rules.nullPlaceholder).toBe("n/a");
            expect(rules.layout).toBe("compact");
        });

        // Scenario: Nothing from either source
        it("should fall back to the CLI default link fields and built-in defaults", () => {
            const rules = mergeRules({}, parseArgs([]));

            expect([...rules.linkFields]).toEqual(["url", "link", "href"]);
            expect(rules.linkStyle).toBe("label");
        });
    });

    describe("resolveRules", () => {
        // Scenario: Explicit --config must be valid
        it("should throw for a malformed file named by --config", () => {
            const file = writeRules("explicit.yml", "linkFields: 3\n");

            expect(() => resolveRules(parseArgs(["--config", file]), createMockLogger()))
                .toThrow(ConfigurationError);
        });

        // Scenario: Bundled file unusable
        it("should fall back with a warning when the default file is malformed", () => {
            const logger = createMockLogger();
            const file = writeRules("default.yml", "linkFields: 3\n");

            const rules = resolveRules(parseArgs([]), logger, file);

            expect([...rules.linkFields]).toEqual(["url", "link", "href"]);
            expect(logger.warn).toHaveBeenCalledTimes(1);
        });

        it("should use an explicit --config file", () => {
            const file = writeRules("explicit-ok.yml", "linkBaseUrl: https://ex.com/items/\n");

            const rules = resolveRules(parseArgs(["--config", file]), createMockLogger());

            expect(rules.linkBaseUrl).toBe("https://ex.com/items/");
        });
    });
});
