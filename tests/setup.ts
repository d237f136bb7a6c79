import { afterEach } from "vitest";
import { clearLogs, setDebugLoggingEnabled } from "@/lib/logging";
import { setLoggerConsoleEnabled } from "@/lib/diagnostics/logger";

// Log entries are asserted through getLogs(); keep the console quiet.
setLoggerConsoleEnabled(false);

afterEach(() => {
  clearLogs();
  setDebugLoggingEnabled(false);
});
