export {
  type DedupeGuard,
  dedupeKey,
  type DedupeRedisClient,
  InMemoryDedupeGuard,
  NoopDedupeGuard,
  RedisDedupeGuard,
  type RedisDedupeGuardOptions,
} from "./dedupe_guard.ts";
