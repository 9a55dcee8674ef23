/**
 * cad.ts — CAD host high-level API
 *
 * Each method corresponds to one HTTP operation.
 * Internally builds PowerShell scripts → calls executor → validates the JSON response.
 *
 * Every call attaches to the application and releases it again; no handle is
 * held between requests.
 */

import type { z } from "zod";
import { runPowerShellJSON } from "./executor.js";
import { BridgeError } from "./errors.js";
import {
  DocumentInfoSchema,
  HostErrorSchema,
  ParameterListSchema,
  RawParameterSchema,
  type ParameterBridge,
} from "./types.js";
import {
  getDocumentScript,
  getParameterScript,
  listParametersScript,
  setCommentScript,
  setExpressionScript,
  setValueScript,
} from "./scripts/parameters.js";

export interface CadBridgeOptions {
  /** COM ProgID of the running application */
  progId: string;
  /** Per-script timeout in milliseconds */
  timeout: number;
}

/**
 * Turn a script's JSON output into the schema's output, or throw the BridgeError the host reported.
 */
export function interpretHostResult<S extends z.ZodTypeAny>(
  raw: unknown,
  schema: S,
): z.output<S> {
  const failure = HostErrorSchema.safeParse(raw);
  if (failure.success) {
    throw new BridgeError(failure.data.code, failure.data.error);
  }
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
    throw new BridgeError(
      "host_error",
      `Unexpected response from CAD host${where}: ${issue?.message ?? "invalid data"}`,
    );
  }
  return parsed.data;
}

export function createCadBridge(options: CadBridgeOptions): ParameterBridge {
  const { progId, timeout } = options;

  async function run<S extends z.ZodTypeAny>(script: string, schema: S): Promise<z.output<S>> {
    return interpretHostResult(await runPowerShellJSON(script, { timeout, progId }), schema);
  }

  return {
    getDocument: () => run(getDocumentScript(progId), DocumentInfoSchema),

    listParameters: () => run(listParametersScript(progId), ParameterListSchema),

    getParameter: (name) => run(getParameterScript(progId, name), RawParameterSchema),

    getValue: async (name) => {
      const p = await run(getParameterScript(progId, name), RawParameterSchema);
      return p.value;
    },

    setValue: (name, value) => {
      if (!Number.isFinite(value)) {
        return Promise.reject(new Error(`Cannot set ${name} to non-finite value ${value}`));
      }
      return run(setValueScript(progId, name, value), RawParameterSchema);
    },

    setExpression: (name, expression) =>
      run(setExpressionScript(progId, name, expression), RawParameterSchema),

    setComment: (name, comment) =>
      run(setCommentScript(progId, name, comment), RawParameterSchema),
  };
}
