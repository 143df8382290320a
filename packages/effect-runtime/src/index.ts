export {
  FileSystemLive,
  FileSystemFrom,
  PrettyLoggerLive,
  runWith,
} from "./layers.js";

export { nodeFileSystem } from "./node-fs.js";

export {
  prettyLogger,
  formatLogLine,
  withSpan,
  parseLogLevel,
} from "./logging.js";
