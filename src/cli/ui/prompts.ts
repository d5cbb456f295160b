/**
 * Interactive prompts wrapper
 */

import * as p from "@clack/prompts";

export const select = p.select;
export const isCancel = p.isCancel;
