let logEnabled = true;

/**
 * Turn the engine logs on or off (tests turn them off)
 *
 * @param enabled - Whether printLog() writes to the console
 */
export function setLogEnabled(enabled: boolean): void {
  logEnabled = enabled;
}

/**
 * Prints a log message with a timestamp and a scope tag
 *
 * @param scope - The component emitting the message (eg. the nebula name)
 * @param message - The message to print
 */
export function printLog(scope: string, message: string): void {
  if (!logEnabled) {
    return;
  }
  console.log(`${new Date().toISOString()} [${scope}] ${message}`);
}
