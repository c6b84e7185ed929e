export {
  ExitCode,
  describeExitCode,
  listExitCodes,
  parseExitCode,
  type ExitCodeInfo,
  type ExitCodeName,
} from "./codes";
export { chainContains, findInChain, walkErrorChain } from "./chain";
export { ErrHelp, isHelpRequested } from "./help";
export { errorf } from "./errorf";
export {
  ExitCodeError,
  hasExitCode,
  pinExitCode,
  withExitCode,
  withExitCodeDeferred,
  withExitCodef,
  type ErrorSlot,
  type ExitCoder,
} from "./carrier";
export {
  createExitCodeResolver,
  resolveExitCode,
  setErrorHandler,
  terminate,
  type ErrorHandler,
  type ExitCodeResolver,
  type ExitCodeResolverOptions,
  type ExitFunction,
  type HandlerResult,
} from "./resolver";
