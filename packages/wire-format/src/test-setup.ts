import { configure, getConsoleSink } from "@logtape/logtape"

// Configure LogTape for tests
await configure({
  sinks: {
    console: getConsoleSink(),
  },
  loggers: [
    {
      category: ["@peerwire"],
      lowestLevel: "warning",
      sinks: ["console"],
    },
    {
      category: ["logtape", "meta"],
      lowestLevel: "warning",
      sinks: ["console"],
    },
  ],
})
