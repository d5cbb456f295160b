/**
 * CLI UI module exports
 */

export type { SummaryItem } from "./formatters";
// Formatters
export {
  formatSummary,
  formatTableRow,
  formatTableSeparator,
  TABLE_WIDTHS,
} from "./formatters";
// Output
export {
  cancel,
  color,
  error,
  info,
  intro,
  LOGO,
  note,
  outro,
  step,
  VERSION,
  warn,
} from "./output";
// Prompts
export { isCancel, select } from "./prompts";

import * as output from "./output";
import * as prompts from "./prompts";

export const ui = {
  intro: output.intro,
  outro: output.outro,
  cancel: output.cancel,
  note: output.note,
  info: output.info,
  warn: output.warn,
  error: output.error,
  step: output.step,
  select: prompts.select,
  isCancel: prompts.isCancel,
};
