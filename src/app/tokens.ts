export const TYPES = {
  DispatcherConfig: Symbol.for("DispatcherConfig"),
  WorkerConfig: Symbol.for("WorkerConfig"),
  PushChannel: Symbol.for("PushChannel"),
  ReceiveChannel: Symbol.for("ReceiveChannel"),
  WorkHandler: Symbol.for("WorkHandler"),
} as const;
