/**
 * @fileoverview Plugin loading exports
 *
 * @module @listcard/engine/plugins
 */

export {
    RendererLoader,
    createRendererFromYaml,
    type YamlRendererDefinition,
    type RendererLoaderConfig,
} from "./RendererLoader.js";
