// Runs before each test file

import { configure, getConsoleSink } from "@logtape/logtape"

// Silent unless a test configures its own sinks; LogTape's own warnings
// still reach the console
await configure({
  sinks: {
    console: getConsoleSink(),
  },
  loggers: [
    {
      category: ["@composable-compat"],
      lowestLevel: "fatal",
      sinks: [],
    },
    {
      category: ["logtape", "meta"],
      lowestLevel: "warning",
      sinks: ["console"],
    },
  ],
  reset: true,
})
