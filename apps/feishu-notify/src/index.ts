#!/usr/bin/env node
/**
 * @fileoverview feishu-notify - Main Entry Point
 *
 * Reads a JSON array of records and posts it to a Feishu group as an
 * interactive card.
 *
 * @module feishu-notify
 */

// Load .env before anything reads the environment
import "dotenv/config";

import { runApp } from "./app.js";

const exitCode = await runApp(process.argv.slice(2), {
    env   : process.env,
    stdin : process.stdin,
    stdout: (text) => {
        process.stdout.write(text);
    },
});

process.exitCode = exitCode;
