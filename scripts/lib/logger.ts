type GitHubAnnotation = "notice" | "warning" | "error";

export type Logger = {
  debug: (message: string) => void;
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
  group: <T>(title: string, fn: () => Promise<T> | T) => Promise<T>;
  child: (scope: string) => Logger;
};

export type LoggerOptions = {
  verbose?: boolean;
  /** Drops debug and info; warnings and errors still print. */
  quiet?: boolean;
  scope?: string;
};

function isGitHubActions(): boolean {
  return process.env.GITHUB_ACTIONS === "true";
}

function escapeGitHubCommandValue(value: string): string {
  return value.replaceAll("%", "%25").replaceAll("\r", "%0D").replaceAll("\n", "%0A");
}

export function toOneLine(raw: string, maxLen = 360): string {
  const oneLine = raw.replace(/\s+/g, " ").trim();
  if (oneLine.length <= maxLen) return oneLine;
  return `${oneLine.slice(0, Math.max(0, maxLen - 1))}…`;
}

function annotate(kind: GitHubAnnotation, message: string): void {
  if (!isGitHubActions()) return;
  console.log(`::${kind}::${escapeGitHubCommandValue(toOneLine(message))}`);
}

export function createLogger(options?: LoggerOptions): Logger {
  const verbose = Boolean(options?.verbose) || process.env.BROADSHEET_LOG_VERBOSE === "true";
  const quiet = Boolean(options?.quiet);
  const scope = options?.scope;
  const prefix = (message: string) => (scope ? `[${scope}] ${message}` : message);

  const debug = (message: string) => {
    if (!verbose || quiet) return;
    console.log(prefix(message));
  };

  const info = (message: string) => {
    if (quiet) return;
    console.log(prefix(message));
  };

  const warn = (message: string) => {
    console.warn(prefix(message));
    annotate("warning", prefix(message));
  };

  const error = (message: string) => {
    console.error(prefix(message));
    annotate("error", prefix(message));
  };

  const group = async <T>(title: string, fn: () => Promise<T> | T): Promise<T> => {
    if (!isGitHubActions()) return await fn();
    console.log(`::group::${escapeGitHubCommandValue(toOneLine(prefix(title), 120))}`);
    try {
      return await fn();
    } finally {
      console.log("::endgroup::");
    }
  };

  const child = (name: string): Logger =>
    createLogger({ verbose, quiet, scope: scope ? `${scope}:${name}` : name });

  return { debug, info, warn, error, group, child };
}
