#!/usr/bin/env node

/**
 * maya-debug-relay: debug adapter for Python running inside Autodesk Maya
 *
 * Injects debugpy into a running Maya through its MEL command port, then
 * relays Debug Adapter Protocol traffic between the editor and debugpy.
 */

import { createCli } from "./cli.js";

const cli = createCli();
await cli.parseAsync();
