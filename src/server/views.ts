/**
 * views.ts — Parameters as the dashboard sees them
 */

import type { RawParameter } from "../bridge/types.js";
import { decodeComment } from "../mapping/comment.js";

export interface ParameterView extends RawParameter {
  /** Bound formula symbol decoded from the comment, or null */
  mapping: string | null;
  note: string | null;
}

export function toParameterView(raw: RawParameter): ParameterView {
  const { symbol, note } = decodeComment(raw.comment);
  return { ...raw, mapping: symbol, note };
}
