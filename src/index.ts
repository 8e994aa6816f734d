#!/usr/bin/env node

/**
 * stepdb: interactive source-level debugging sessions
 *
 * Navigates a stopped program's frames, evaluates code in them, renders the
 * surrounding source and hands a resume reason back to the tracer.
 */

import { createCli } from "./cli.js";

const cli = createCli();
cli.parseAsync().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exit(1);
});
