/**
 * Code sent into Maya
 *
 * Python snippets are written to a temp file and executed through a MEL
 * `python()` call on the command port. String values are embedded as JSON
 * string literals, which Python reads back unchanged.
 */

import * as path from "node:path";
import { formatAddress, type HostAddress } from "../util/net.js";

const pyString = (value: string): string => JSON.stringify(value);

const melString = (value: string): string => value.replace(/\\/g, "\\\\").replace(/"/g, '\\"');

/**
 * Starts debugpy inside Maya, listening on the engine address. debugpy needs
 * mayapy rather than the Maya executable to spawn its helpers.
 */
export function formatInjectionCode(engine: HostAddress, debugpyPath?: string): string {
  const lines = ["import os", "import sys"];

  if (debugpyPath) {
    lines.push(
      `_relay_debugpy_path = ${pyString(debugpyPath)}`,
      "if _relay_debugpy_path not in sys.path:",
      "    sys.path.insert(0, _relay_debugpy_path)"
    );
  }

  lines.push(
    "import debugpy",
    '_relay_mayapy = "mayapy.exe" if os.name == "nt" else "mayapy"',
    "debugpy.configure(python=os.path.join(os.path.dirname(sys.executable), _relay_mayapy))",
    "try:",
    `    debugpy.listen((${pyString(engine.host)}, ${engine.port}))`,
    "except RuntimeError:",
    "    # already listening from an earlier session in this Maya instance",
    "    pass",
    ""
  );

  return lines.join("\n");
}

/**
 * Runs the user's script as `__main__`, with its directory importable.
 */
export function formatRunDirective(program: string): string {
  return [
    "import runpy",
    "import sys",
    `_relay_dir = ${pyString(path.dirname(program))}`,
    "if _relay_dir not in sys.path:",
    "    sys.path.insert(0, _relay_dir)",
    `runpy.run_path(${pyString(program)}, run_name="__main__")`,
    "",
  ].join("\n");
}

/**
 * MEL command executing a Python file. Forward slashes keep the path free of
 * escapes on every platform.
 */
export function formatExecCommand(filePath: string): string {
  const pythonPath = filePath.replace(/\\/g, "/");
  return `python("${melString(`exec(open(${pyString(pythonPath)}).read())`)}");`;
}

export function formatRemediation(host: HostAddress): string {
  return [
    `Could not connect to Maya's command port at ${formatAddress(host)}.`,
    "Please run the following command in Maya and try again:",
    `    cmds.commandPort(name="${formatAddress(host)}", sourceType="mel")`,
  ].join("\n");
}
