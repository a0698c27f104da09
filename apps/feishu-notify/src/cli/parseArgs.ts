/**
 * @fileoverview Command-line argument parsing
 *
 * Turns argv into a typed CliOptions value. Accepts "--flag value" and
 * "--flag=value". Anything unrecognised is a ConfigurationError so the run
 * aborts before input is read.
 *
 * @module cli/parseArgs
 */

import {
    ConfigurationError,
    DEFAULT_CARD_THEME,
    isLinkStyle,
    type ItemLayout,
    type LinkStyle,
} from "@listcard/engine";

/**
 * Options collected from the command line.
 * List and rule fields are undefined when the flag was not given, so the
 * rules file can supply them.
 */
export interface CliOptions {
    title: string;
    headerText: string;
    theme: string;
    wideLayout: boolean;
    file?: string;
    linkFields?: string[];
    statusFields?: string[];
    linkBaseUrl?: string;
    layout: ItemLayout;
    linkStyle?: LinkStyle;
    linkLabel?: string;
    showItemIndex: boolean;
    rendererPath?: string;
    configPath?: string;
    timeoutMs: number;
    dryRun: boolean;
    verbose: boolean;
    help: boolean;
}

export const DEFAULT_TITLE = "Notification";
export const DEFAULT_HEADER_TEXT = "**Data list report**";
export const DEFAULT_TIMEOUT_MS = 10_000;

/** Link fields used when neither --link-fields nor the rules file names any */
export const DEFAULT_CLI_LINK_FIELDS: readonly string[] = ["url", "link", "href"];

export const USAGE = `Usage: feishu-notify [options] < data.json

Send a JSON array of records to a Feishu group as an interactive card.

Options:
  -t, --title <text>          Card title (default: ${DEFAULT_TITLE})
  -H, --header-text <md>      Header text, lark markdown (default: ${DEFAULT_HEADER_TEXT})
  -c, --color <theme>         Header theme (default: ${DEFAULT_CARD_THEME})
      --narrow                Disable wide-screen mode
  -f, --file <path>           Read JSON from a file instead of stdin
      --link-fields <a,b>     Fields rendered as links (default: ${DEFAULT_CLI_LINK_FIELDS.join(",")})
      --status-fields <a,b>   Fields that get status glyphs (default: status,state,result)
      --base-url <url>        Base URL for relative link values
      --compact               One line per item, fields joined by " | "
      --link-style <style>    "label" (fixed label) or "url" (truncated URL)
      --link-label <text>     Label used by the "label" style (default: view details)
      --show-index            Add a bold "Item n" heading to each item
      --renderer <path>       Custom renderer (.js/.mjs module or .yml template)
      --config <path>         Rules file (YAML)
      --timeout <ms>          Delivery timeout in milliseconds (default: ${DEFAULT_TIMEOUT_MS})
      --dry-run               Print the payload instead of sending it
  -v, --verbose               Debug logging
  -h, --help                  Show this help

Environment:
  FEISHU_WEBHOOK_URL          Incoming webhook URL (may be set in .env)

Example:
  echo '[{"name":"GitHub","url":"https://github.com"}]' | feishu-notify -t "Links"
`;

/**
 * Split a comma-separated list, dropping blanks.
 *
 * @example
 * ```typescript
 * splitList(" url, link ,,href "); // ["url", "link", "href"]
 * ```
 */
export function splitList(value: string): string[] {
    return value
        .split(",")
        .map((item) => item.trim())
        .filter((item) => item.length > 0);
}

/**
 * Parse a positive integer flag value.
 */
function parsePositiveInt(flag: string, value: string): number {
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed <= 0) {
        throw new ConfigurationError(`${flag} expects a positive integer, got "${value}"`, { flag, value });
    }
    return parsed;
}

/**
 * Parse command-line arguments (without the node and script entries).
 *
 * @param argv - Arguments, e.g. process.argv.slice(2)
 * @returns Parsed options with defaults applied
 * @throws ConfigurationError for unknown flags, missing values or invalid values
 */
export function parseArgs(argv: readonly string[]): CliOptions {
    const options: CliOptions = {
        title        : DEFAULT_TITLE,
        headerText   : DEFAULT_HEADER_TEXT,
        theme        : DEFAULT_CARD_THEME,
        wideLayout   : true,
        layout       : "multiline",
        showItemIndex: false,
        timeoutMs    : DEFAULT_TIMEOUT_MS,
        dryRun       : false,
        verbose      : false,
        help         : false,
    };

    for (let i = 0; i < argv.length; i++) {
        const arg = argv[i];
        const eq = arg.startsWith("--") ? arg.indexOf("=") : -1;
        const flag = eq > 0 ? arg.slice(0, eq) : arg;
        const inline = eq > 0 ? arg.slice(eq + 1) : undefined;

        const nextReq = (): string => {
            if (inline !== undefined) {
                return inline;
            }
            const value = argv[++i];
            if (value === undefined) {
                throw new ConfigurationError(`Missing value for ${flag}`, { flag });
            }
            return value;
        };

        switch (flag) {
            case "-t":
            case "--title":
                options.title = nextReq();
                break;
            case "-H":
            case "--header-text":
                options.headerText = nextReq();
                break;
            case "-c":
            case "--color":
                options.theme = nextReq();
                break;
            case "--narrow":
                options.wideLayout = false;
                break;
            case "-f":
            case "--file":
                options.file = nextReq();
                break;
            case "--link-fields":
                options.linkFields = splitList(nextReq());
                break;
            case "--status-fields":
                options.statusFields = splitList(nextReq());
                break;
            case "--base-url":
                options.linkBaseUrl = nextReq();
                break;
            case "--compact":
                options.layout = "compact";
                break;
            case "--link-style": {
                const value = nextReq();
                if (!isLinkStyle(value)) {
                    throw new ConfigurationError(`--link-style expects "label" or "url", got "${value}"`, { value });
                }
                options.linkStyle = value;
                break;
            }
            case "--link-label":
                options.linkLabel = nextReq();
                break;
            case "--show-index":
                options.showItemIndex = true;
                break;
            case "--renderer":
                options.rendererPath = nextReq();
                break;
            case "--config":
                options.configPath = nextReq();
                break;
            case "--timeout":
                options.timeoutMs = parsePositiveInt(flag, nextReq());
                break;
            case "--dry-run":
                options.dryRun = true;
                break;
            case "-v":
            case "--verbose":
                options.verbose = true;
                break;
            case "-h":
            case "--help":
                options.help = true;
                break;
            default:
                throw new ConfigurationError(`Unknown option: ${arg}`, { arg });
        }
    }

    return options;
}
