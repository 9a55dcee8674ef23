/**
 * types.ts — Shapes exchanged with the CAD host
 */

import { z } from "zod";
import { BRIDGE_ERROR_CODES } from "./errors.js";

export const DocumentInfoSchema = z.object({
  name: z.string(),
  fullPath: z.string(),
  type: z.enum(["part", "assembly"]),
});

export const ParameterKindSchema = z.enum(["model", "user", "reference", "table"]);

export const RawParameterSchema = z.object({
  name: z.string(),
  // Numeric parameters report database units; text and boolean user parameters report as-is.
  value: z.union([z.number(), z.string(), z.boolean()]).nullable(),
  unit: z
    .string()
    .nullable()
    .transform((u) => u || "unitless"),
  expression: z.string().nullable().transform((e) => e ?? ""),
  comment: z.string().nullable().transform((c) => c ?? ""),
  kind: ParameterKindSchema,
  isReadOnly: z.boolean(),
});

export const ParameterListSchema = z.object({
  document: DocumentInfoSchema,
  parameters: z.array(RawParameterSchema),
});

export const HostErrorSchema = z.object({
  error: z.string(),
  code: z.enum(BRIDGE_ERROR_CODES),
});

export type DocumentInfo = z.infer<typeof DocumentInfoSchema>;
export type ParameterKind = z.infer<typeof ParameterKindSchema>;
export type RawParameter = z.output<typeof RawParameterSchema>;
export type ParameterList = z.output<typeof ParameterListSchema>;
export type ParameterValue = RawParameter["value"];

/**
 * Everything the HTTP layer needs from the host application.
 * Writes resolve to the parameter as read back after the change.
 */
export interface ParameterBridge {
  getDocument(): Promise<DocumentInfo>;
  listParameters(): Promise<ParameterList>;
  getParameter(name: string): Promise<RawParameter>;
  getValue(name: string): Promise<ParameterValue>;
  setValue(name: string, value: number): Promise<RawParameter>;
  setExpression(name: string, expression: string): Promise<RawParameter>;
  setComment(name: string, comment: string): Promise<RawParameter>;
}
