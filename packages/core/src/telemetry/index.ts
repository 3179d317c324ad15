export { TRACER_NAME, withSpan } from "./tracing.js";
