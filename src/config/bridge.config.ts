import { queueNameFromUrl } from "../channel/queue-names";
import { BridgeError } from "../errors/bridge.error";

export interface QueueSettings {
  region: string;
  receiveQueueUrl: string;
  receiveQueueName: string;
}

export type WorkerConfig = QueueSettings;

export interface DispatcherConfig extends QueueSettings {
  pushQueueUrl: string;
  pushQueueName: string;
  /** Server-side long wait of each ReceiveMessage call (SQS caps it at 20s) */
  pollWaitSeconds: number;
  /** Lease taken on each inspected response */
  pollVisibilityTimeoutSeconds: number;
  /** Pause after releasing a response that belongs to another caller */
  mismatchBackoffMs: number;
}

type Env = Record<string, string | undefined>;

export function loadWorkerConfig(env: Env): WorkerConfig {
  const receiveQueueUrl = requireEnv(env, "RECEIVE_QUEUE_URL");
  return {
    region: env.AWS_REGION?.trim() || "unknown",
    receiveQueueUrl,
    receiveQueueName: queueNameFromUrl(receiveQueueUrl),
  };
}

export function loadDispatcherConfig(env: Env): DispatcherConfig {
  const pushQueueUrl = requireEnv(env, "PUSH_QUEUE_URL");
  return {
    ...loadWorkerConfig(env),
    pushQueueUrl,
    pushQueueName: queueNameFromUrl(pushQueueUrl),
    pollWaitSeconds: readInt(env, "POLL_WAIT_SECONDS", 20, 0, 20),
    pollVisibilityTimeoutSeconds: readInt(
      env,
      "POLL_VISIBILITY_TIMEOUT_SECONDS",
      10,
      0,
      43_200
    ),
    mismatchBackoffMs: readInt(env, "MISMATCH_BACKOFF_MS", 20, 0, 1_000),
  };
}

function requireEnv(env: Env, name: string): string {
  const value = env[name]?.trim();
  if (!value) {
    throw new BridgeError("ConfigurationMissing", `missing env ${name}`);
  }
  return value;
}

function readInt(
  env: Env,
  name: string,
  fallback: number,
  min: number,
  max: number
): number {
  const raw = env[name]?.trim();
  if (!raw) return fallback;
  const parsed = Number.parseInt(raw, 10);
  if (Number.isNaN(parsed)) return fallback;
  return Math.min(Math.max(parsed, min), max);
}
