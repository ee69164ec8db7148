import { Topics, createEventBus, createEventLoggerMiddleware } from "@cadlink/event-bus";

export const bus = createEventBus({
  middlewares: [
    createEventLoggerMiddleware({
      ignoreTopics: [Topics.LOG_EVENT, Topics.CAD_PROBE_CYCLE_COMPLETED],
      ignorePrefixes: ["rpc:"],
      logTopic: Topics.LOG_EVENT
    })
  ]
});
