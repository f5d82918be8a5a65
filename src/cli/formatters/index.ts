export { HumanFormatter } from './human.js';
export { JsonFormatter } from './json.js';
export { OUTPUT_FORMATS } from './types.js';
export type { OutputFormat, FormatOptions, IFormatter } from './types.js';

import { HumanFormatter } from './human.js';
import { JsonFormatter } from './json.js';
import type { FormatOptions, IFormatter, OutputFormat } from './types.js';

export function createFormatter(format: OutputFormat, options: Partial<FormatOptions> = {}): IFormatter {
  return format === 'json' ? new JsonFormatter() : new HumanFormatter(options);
}
