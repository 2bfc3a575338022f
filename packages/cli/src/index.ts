export { status } from './commands/status.js';
export type { StatusResult } from './commands/status.js';
export { show, DEFAULT_SHOW_LIMIT } from './commands/show.js';
export type { ShowOptions, ShowResult } from './commands/show.js';
export { circles } from './commands/circles.js';
export type { CirclesResult } from './commands/circles.js';
export { purge } from './commands/purge.js';
export type { PurgeOptions, PurgeResult } from './commands/purge.js';
export { sweep } from './commands/sweep.js';
export type { SweepOptions, SweepResult } from './commands/sweep.js';
export { parseArgs, flagNumber, flagString } from './utils.js';
export type { CommandOptions, ParsedArgs } from './utils.js';
