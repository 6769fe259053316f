#!/usr/bin/env node
/**
 * dwh-cluster executable.
 */

import { runCli } from './index.js';

const abortController = new AbortController();

// A second interrupt falls through to Node's default handler
process.once('SIGINT', () => abortController.abort());

process.exitCode = await runCli(process.argv.slice(2), { signal: abortController.signal });
