export type { PublishContent, Publisher, PublishResult } from "./types.ts";
export {
  classifyPublishError,
  PermanentPublishError,
  PublishError,
  type PublishErrorClass,
  PublishTimeoutError,
  TransientPublishError,
} from "./errors.ts";
export { DryRunPublisher } from "./dry_run_publisher.ts";
