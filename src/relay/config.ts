/**
 * Session configuration taken from the debugger's attach request, and the
 * attach arguments debugpy expects in its place.
 */

import * as path from "node:path";
import { z } from "zod";
import type { HostAddress } from "../util/net.js";

const AddressSchema = z.object({
  host: z.string().min(1),
  port: z.coerce.number().int().min(1).max(65535),
});

const AttachArgumentsSchema = z.object({
  program: z.string().min(1),
  maya: AddressSchema,
  debugpy: AddressSchema,
  justMyCode: z.boolean().optional(),
});

export interface SessionConfig {
  readonly hostAddress: Readonly<HostAddress>;
  readonly engineAddress: Readonly<HostAddress>;
  /** Program path, normalized for this platform */
  readonly program: string;
  readonly justMyCode?: boolean;
}

export interface EngineAttachArguments {
  name: string;
  type: "python";
  request: "attach";
  connect: HostAddress;
  pathMappings: Array<{ localRoot: string; remoteRoot: string }>;
  program: string;
  justMyCode?: boolean;
}

export class AttachConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid attach configuration: ${issues.join("; ")}`);
    this.name = "AttachConfigError";
    this.issues = issues;
  }
}

export function parseSessionConfig(args: unknown): SessionConfig {
  const result = AttachArgumentsSchema.safeParse(args);
  if (!result.success) {
    throw new AttachConfigError(
      result.error.issues.map((issue) => `${issue.path.join(".") || "arguments"}: ${issue.message}`)
    );
  }

  const { program, maya, debugpy, justMyCode } = result.data;
  const config: SessionConfig = {
    hostAddress: Object.freeze({ host: maya.host, port: maya.port }),
    engineAddress: Object.freeze({ host: debugpy.host, port: debugpy.port }),
    program: path.normalize(program),
    ...(justMyCode === undefined ? {} : { justMyCode }),
  };
  return Object.freeze(config);
}

/**
 * Arguments for debugpy's own attach request. Only the engine address and
 * the program paths come from the session; Maya's address stays with the
 * relay.
 */
export function toEngineAttachArguments(config: SessionConfig): EngineAttachArguments {
  const dir = path.dirname(config.program);
  const args: EngineAttachArguments = {
    name: "Maya",
    type: "python",
    request: "attach",
    connect: { host: config.engineAddress.host, port: config.engineAddress.port },
    pathMappings: [{ localRoot: dir, remoteRoot: dir }],
    program: config.program,
  };
  if (config.justMyCode !== undefined) {
    args.justMyCode = config.justMyCode;
  }
  return args;
}
