/**
 * Purpose: Declare template definitions used to seed new subtrees.
 */

import type { MetaTypeTag, MetaValue } from "../types.js";

export interface TemplateField {
  key: string;
  type: MetaTypeTag;
  /** Required unless `prompt` is set. */
  default?: MetaValue;
  /** Leave the field unset and record it as required on the created node. */
  prompt?: boolean;
}

export interface TemplateEntry {
  text?: string;
  fields?: TemplateField[];
  children?: TemplateEntry[];
}

export interface TemplateDefinition {
  id: string;
  root: TemplateEntry;
}

export const META_TYPE_TAGS: readonly MetaTypeTag[] = ["string", "number", "boolean", "ref"];
