import pino from "pino";

// Use pino-pretty only when running the CLI in development, never when embedded as a library.
// Logs go to stderr so that `--json` output on stdout stays parseable.
const isDev = process.env.NODE_ENV !== "production";
const isCLI = /main\.[cm]?[jt]s$/.test(process.argv[1] ?? "");
const level = process.env.LOG_LEVEL || "info";

export const logger = isDev && isCLI
  ? pino({
      level,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          ignore: "pid,hostname",
          destination: 2,
        },
      },
    })
  : pino({ level }, pino.destination(2));
