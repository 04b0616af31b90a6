/**
 * Terminal logging for the crawler: coloured level prefixes, timestamps in
 * verbose mode, and a single-line progress bar that log lines print above.
 */

const ANSI = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  dim: "\x1b[2m",

  red: "\x1b[31m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  blue: "\x1b[34m",
  cyan: "\x1b[36m",
  gray: "\x1b[90m",

  clearLine: "\x1b[2K",
  cursorToStart: "\x1b[0G",
  hideCursor: "\x1b[?25l",
  showCursor: "\x1b[?25h",
} as const;

export type LogLevel = "debug" | "info" | "success" | "warn" | "error";

interface LoggerConfig {
  verbose: boolean;
  showProgress: boolean;
}

interface ProgressState {
  current: number;
  total: number;
  currentUrl: string;
  skipped: number;
  passages: number;
  startTime: number;
}

const PROGRESS_BAR_WIDTH = 30;
const MIN_TERMINAL_WIDTH = 80;
const PROGRESS_FIXED_WIDTH = 64;

const levelStyles: Record<LogLevel, { color: string; prefix: string }> = {
  debug: { color: ANSI.gray, prefix: "DEBUG" },
  info: { color: ANSI.blue, prefix: "INFO" },
  success: { color: ANSI.green, prefix: "OK" },
  warn: { color: ANSI.yellow, prefix: "WARN" },
  error: { color: ANSI.red, prefix: "ERROR" },
};

function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${Math.round(ms)}ms`;
  }
  const seconds = Math.floor(ms / 1000);
  if (seconds < 60) {
    return `${seconds}s`;
  }
  const minutes = Math.floor(seconds / 60);
  return `${minutes}m ${seconds % 60}s`;
}

function truncateMiddle(value: string, maxLength: number): string {
  if (value.length <= maxLength) {
    return value;
  }
  const keep = Math.max(0, maxLength - 3);
  const head = Math.ceil(keep / 2);
  return `${value.slice(0, head)}...${value.slice(value.length - (keep - head))}`;
}

class Logger {
  private config: LoggerConfig = { verbose: false, showProgress: true };
  private progress: ProgressState | null = null;
  private progressVisible = false;
  private readonly isTerminal = process.stdout.isTTY ?? false;

  configure(config: Partial<LoggerConfig>): void {
    this.config = { ...this.config, ...config };
  }

  get verbose(): boolean {
    return this.config.verbose;
  }

  private get progressEnabled(): boolean {
    return this.config.showProgress && this.isTerminal;
  }

  private formatMessage(level: LogLevel, message: string): string {
    const style = levelStyles[level];
    const timestamp = this.config.verbose
      ? `${ANSI.dim}[${new Date().toISOString().slice(11, 23)}]${ANSI.reset} `
      : "";
    return `${timestamp}${style.color}${ANSI.bold}[${style.prefix}]${ANSI.reset} ${message}`;
  }

  private clearProgressLine(): void {
    if (this.progressVisible) {
      process.stdout.write(`${ANSI.cursorToStart}${ANSI.clearLine}`);
      this.progressVisible = false;
    }
  }

  private writeLog(level: LogLevel, message: string): void {
    this.clearProgressLine();
    const formatted = this.formatMessage(level, message);

    if (level === "error") {
      console.error(formatted);
    } else if (level === "warn") {
      console.warn(formatted);
    } else {
      console.info(formatted);
    }

    this.renderProgress();
  }

  debug(message: string): void {
    if (this.config.verbose) {
      this.writeLog("debug", message);
    }
  }

  info(message: string): void {
    this.writeLog("info", message);
  }

  success(message: string): void {
    this.writeLog("success", message);
  }

  warn(message: string): void {
    this.writeLog("warn", message);
  }

  error(message: string): void {
    this.writeLog("error", message);
  }

  startProgress(total: number): void {
    this.progress = {
      current: 0,
      total,
      currentUrl: "",
      skipped: 0,
      passages: 0,
      startTime: Date.now(),
    };
    if (this.progressEnabled) {
      process.stdout.write(ANSI.hideCursor);
    }
    this.renderProgress();
  }

  /**
   * Move the bar to a new page. `total` grows while a seed crawl discovers
   * links.
   */
  updateProgress(current: number, url: string, total?: number): void {
    if (!this.progress) {
      return;
    }
    this.progress.current = current;
    this.progress.currentUrl = url;
    if (total !== undefined) {
      this.progress.total = Math.max(total, current);
    }
    this.renderProgress();
  }

  recordSkip(): void {
    if (this.progress) {
      this.progress.skipped += 1;
    }
  }

  recordPassages(count: number): void {
    if (this.progress) {
      this.progress.passages += count;
    }
  }

  endProgress(): void {
    this.clearProgressLine();
    if (this.progressEnabled) {
      process.stdout.write(ANSI.showCursor);
    }

    const progress = this.progress;
    this.progress = null;
    if (!progress) {
      return;
    }

    const elapsed = formatDuration(Date.now() - progress.startTime);
    const skipped =
      progress.skipped > 0
        ? `, ${ANSI.yellow}${progress.skipped} skipped${ANSI.reset}`
        : "";
    console.info(
      `${ANSI.cyan}${ANSI.bold}[DONE]${ANSI.reset} ${progress.current} page(s) in ${ANSI.bold}${elapsed}${ANSI.reset} (${ANSI.green}${progress.passages} passages${ANSI.reset}${skipped})`
    );
  }

  private renderProgress(): void {
    if (!(this.progress && this.progressEnabled)) {
      return;
    }

    const { current, total, currentUrl, passages, startTime } = this.progress;
    const ratio = total > 0 ? Math.min(1, current / total) : 0;
    const filled = Math.round(ratio * PROGRESS_BAR_WIDTH);
    const bar = `${ANSI.green}${"█".repeat(filled)}${ANSI.gray}${"░".repeat(PROGRESS_BAR_WIDTH - filled)}${ANSI.reset}`;

    const elapsedMs = Date.now() - startTime;
    const remaining = total - current;
    const eta =
      current > 0 && remaining > 0
        ? ` ETA ${formatDuration((elapsedMs / current) * remaining)}`
        : "";

    const width = process.stdout.columns ?? MIN_TERMINAL_WIDTH;
    const displayUrl = truncateMiddle(
      currentUrl,
      Math.max(20, width - PROGRESS_FIXED_WIDTH)
    );

    process.stdout.write(
      `${ANSI.cursorToStart}${ANSI.clearLine}${bar} ${ANSI.bold}${Math.round(ratio * 100)}%${ANSI.reset} ${ANSI.dim}(${current}/${total}, ${passages} passages) ${formatDuration(elapsedMs)}${eta}${ANSI.reset} ${ANSI.cyan}${displayUrl}${ANSI.reset}`
    );
    this.progressVisible = true;
  }

  logCrawlStart(baseUrl: string, config: Record<string, unknown>): void {
    if (!this.config.verbose) {
      return;
    }
    console.info(`\n${ANSI.cyan}${ANSI.bold}Crawl Configuration:${ANSI.reset}`);
    console.info(`  ${ANSI.dim}Base URL:${ANSI.reset} ${baseUrl}`);
    for (const [key, value] of Object.entries(config)) {
      console.info(`  ${ANSI.dim}${key}:${ANSI.reset} ${String(value)}`);
    }
    console.info("");
  }

  logPageFetched(
    url: string,
    status: number,
    contentType: string,
    length: number
  ): void {
    this.debug(
      `Fetched ${url} status=${status} ct=${contentType || "-"} len=${length}`
    );
  }

  logExtracted(url: string, chars: number, title: string, strategy: string): void {
    this.debug(
      `Extracted ${chars} chars from ${url} via ${strategy} title=${JSON.stringify(title)}`
    );
  }

  logPassagesWritten(url: string, count: number): void {
    this.success(
      `Wrote ${count} passage(s) from ${ANSI.cyan}${url}${ANSI.reset}`
    );
  }

  logSkipped(message: string): void {
    this.debug(`Skipped: ${message}`);
  }

  logFallback(message: string): void {
    this.debug(`Fallback: ${message}`);
  }

  printFailureSummary(failures: string[]): void {
    if (failures.length === 0) {
      return;
    }
    console.warn(
      `\n${ANSI.yellow}${ANSI.bold}Failures (${failures.length}):${ANSI.reset}`
    );
    for (const failure of failures) {
      console.warn(`  ${ANSI.dim}•${ANSI.reset} ${failure}`);
    }
  }
}

export const logger = new Logger();
