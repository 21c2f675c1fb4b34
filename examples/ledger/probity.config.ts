import { defineConfig } from "@probity/cli";

export default defineConfig({
  suites: "./suites",
  run: {
    concurrency: 4,
    timeout: 2000,
  },
  report: {
    format: "terminal",
  },
});
