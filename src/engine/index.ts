export {ActionExecutor, type LogLine, type OnLogLine} from './executor.js'
export {ProcessExecutor} from './process-executor.js'
export type {ActionRequest, ActionResult} from './types.js'
