/**
 * @fileoverview Renderer Loader
 *
 * Loads a custom renderer from:
 * - YAML files (a line template with {{field}} placeholders)
 * - Code files (JS modules exporting a Renderer or a render function)
 *
 * @module @listcard/engine/plugins/RendererLoader
 */

import { readFileSync, existsSync, statSync } from "fs";
import { resolve, extname, basename } from "path";
import { pathToFileURL } from "url";
import { parse as parseYaml } from "yaml";
import type { Renderer } from "../contracts/Renderer.js";
import { createRenderer, isRenderer } from "../contracts/Renderer.js";
import { isListRecord } from "../contracts/ListRecord.js";
import type { EngineLogger } from "../contracts/Logger.js";
import { DEFAULT_NULL_PLACEHOLDER } from "../contracts/ClassificationRules.js";
import { ConfigurationError, RenderFault, errorMessage } from "../contracts/errors.js";
import { formatValue } from "../classifier/FieldClassifier.js";

/**
 * YAML renderer definition.
 *
 * @example
 * ```yaml
 * name: deploy-line
 * description: One line per deploy
 * template: "{{index}}. **{{service}}** {{status}} ({{duration}}s)"
 * ```
 */
export interface YamlRendererDefinition {
    /** Unique name/id for this renderer */
    name: string;

    /** Human-readable description */
    description?: string;

    /**
     * Item template. {{index}} is the 1-based position, {{field}} the value of
     * that field. Missing or null fields render as the placeholder.
     */
    template: string;

    /** Placeholder for missing values (default "—") */
    placeholder?: string;
}

/**
 * Renderer loader configuration.
 */
export interface RendererLoaderConfig {
    /** Logger for loading */
    logger?: EngineLogger;
}

/**
 * Default console logger.
 */
const defaultLogger: EngineLogger = {
    debug: (msg, data) => console.debug(`[RendererLoader] ${msg}`, data ?? ""),
    info : (msg, data) => console.info(`[RendererLoader] ${msg}`, data ?? ""),
    warn : (msg, data) => console.warn(`[RendererLoader] ${msg}`, data ?? ""),
    error: (msg, data) => console.error(`[RendererLoader] ${msg}`, data ?? ""),
};

const kPLACEHOLDER_PATTERN = /\{\{\s*([^{}]+?)\s*\}\}/g;

/**
 * Create a Renderer from a YAML definition.
 *
 * @param def - YAML renderer definition
 * @returns Renderer that fills the template from each record
 */
export function createRendererFromYaml(def: YamlRendererDefinition): Renderer {
    const placeholder = def.placeholder ?? DEFAULT_NULL_PLACEHOLDER;

    return {
        id         : `yaml:${def.name}`,
        description: def.description,

        render(record, index): string {
            return def.template.replace(kPLACEHOLDER_PATTERN, (_match, name: string) => {
                if (name === "index") {
                    return String(index + 1);
                }
                return formatValue(Object.hasOwn(record, name) ? record[name] : undefined, placeholder);
            });
        },
    };
}

/**
 * Wrap a plain JS function (untyped module export) as a Renderer.
 */
function rendererFromFunction(id: string, fn: Function): Renderer {
    return createRenderer(id, (record, index, records) => {
        const output: unknown = Reflect.apply(fn, undefined, [record, index, records]);
        if (typeof output !== "string") {
            throw new RenderFault(`Renderer ${id} returned ${typeof output} instead of a string`, { index });
        }
        return output;
    });
}

/**
 * Renderer Loader
 *
 * @example
 * ```typescript
 * const loader = new RendererLoader();
 *
 * const renderer = await loader.loadFromFile("./renderers/deploys.yml");
 * const engine = new CardEngine({ renderer });
 * ```
 */
export class RendererLoader {
    private readonly logger: EngineLogger;

    constructor(config: RendererLoaderConfig = {}) {
        this.logger = config.logger ?? defaultLogger;
    }

    /**
     * Load a renderer from a file, dispatching on its extension.
     *
     * - .yml/.yaml → template renderer
     * - .js/.mjs/.cjs → code renderer
     *
     * @param filePath - Path to the renderer file
     * @throws ConfigurationError if the file is missing, unsupported or invalid
     */
    async loadFromFile(filePath: string): Promise<Renderer> {
        const absolutePath = resolve(filePath);

        if (!existsSync(absolutePath) || !statSync(absolutePath).isFile()) {
            throw new ConfigurationError(`Renderer file not found: ${filePath}`, { filePath });
        }

        const ext = extname(absolutePath).toLowerCase();
        let renderer: Renderer;

        if (ext === ".yml" || ext === ".yaml") {
            renderer = this.loadYamlFile(absolutePath);
        }
        else if (ext === ".js" || ext === ".mjs" || ext === ".cjs") {
            renderer = await this.loadCodeFile(absolutePath);
        }
        else {
            throw new ConfigurationError(`Unsupported renderer file type: ${ext || "(none)"}`, { filePath });
        }

        this.logger.info("Renderer loaded", { filePath, id: renderer.id });
        return renderer;
    }

    /**
     * Load a template renderer from a YAML file.
     *
     * @param filePath - Path to YAML file
     */
    loadYamlFile(filePath: string): Renderer {
        let parsed: unknown;

        try {
            parsed = parseYaml(readFileSync(filePath, "utf-8"));
        }
        catch (error) {
            throw new ConfigurationError(`Invalid renderer YAML in ${filePath}: ${errorMessage(error)}`, { filePath }, { cause: error });
        }

        if (!this.isYamlRendererDefinition(parsed)) {
            throw new ConfigurationError(
                `Invalid renderer definition in ${filePath}: expected { name, template }`,
                { filePath }
            );
        }

        this.logger.debug("Loaded YAML renderer", { name: parsed.name });
        return createRendererFromYaml(parsed);
    }

    /**
     * Load a renderer from a JS module.
     *
     * Resolution order:
     * 1. default export implementing Renderer
     * 2. default export that is a function (wrapped, id = file name)
     * 3. first named export implementing Renderer
     *
     * @param filePath - Path to JS module
     * @throws ConfigurationError if the module fails to load or exports no renderer
     */
    async loadCodeFile(filePath: string): Promise<Renderer> {
        let module: Record<string, unknown>;

        try {
            module = await import(pathToFileURL(filePath).href);
        }
        catch (error) {
            throw new ConfigurationError(`Invalid renderer module ${filePath}: ${errorMessage(error)}`, { filePath }, { cause: error });
        }

        if (isRenderer(module.default)) {
            this.logger.debug("Loaded default renderer", { id: module.default.id });
            return module.default;
        }

        if (typeof module.default === "function") {
            const id = basename(filePath, extname(filePath));
            this.logger.debug("Loaded default render function", { id });
            return rendererFromFunction(id, module.default);
        }

        for (const key of Object.keys(module)) {
            const exported = module[key];
            if (isRenderer(exported)) {
                this.logger.debug("Loaded code renderer", { id: exported.id, export: key });
                return exported;
            }
        }

        throw new ConfigurationError(`No renderer exported by ${filePath}`, { filePath });
    }

    /**
     * Type guard for YAML renderer definition.
     */
    private isYamlRendererDefinition(obj: unknown): obj is YamlRendererDefinition {
        return (
            isListRecord(obj) &&
            typeof obj.name === "string" &&
            typeof obj.template === "string" &&
            (obj.placeholder === undefined || typeof obj.placeholder === "string")
        );
    }
}
