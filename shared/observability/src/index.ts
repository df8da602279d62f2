export { logger, logInfo, logWarn, logError, type LogAttributes } from "./logger.js";
export {
  requestLoggingMiddleware,
  errorLoggingMiddleware,
  withReportSpan,
  type ReportSpanInput,
} from "./middleware.js";
