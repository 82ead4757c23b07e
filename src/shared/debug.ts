// Debug levels: 0 = off, 1 = errors only, 2 = warnings + errors, 3 = info + warnings + errors, 4 = verbose
// Check if we're in Node.js environment (process exists) or browser (process undefined)
const isNode = typeof process !== 'undefined' && process.env;
export const DEBUG_LEVEL = Number(isNode ? process.env.DEBUG_LEVEL ?? 3 : 3);

const ANSI = {
    reset: "\x1b[0m",
    cyan: "\x1b[36m",
    yellow: "\x1b[33m",
    gray: "\x1b[90m",
    red: "\x1b[31m",
};

export function debug_log(...args: unknown[]): void {
    if (DEBUG_LEVEL < 3) return;
    console.log(...args);
}

export function debug_warn(...args: unknown[]): void {
    if (DEBUG_LEVEL < 2) return;
    console.warn(...args);
}

export function debug_error(service: string, message: string, err?: unknown): void {
    if (DEBUG_LEVEL < 1) return;
    const errorMsg = err === undefined ? '' : err instanceof Error ? err.message : String(err);
    const stack = err instanceof Error ? err.stack : '';
    console.error(`${ANSI.red}[${service}] ERROR: ${message}${ANSI.reset}`);
    if (errorMsg) console.error(`${ANSI.red}[${service}] Details: ${errorMsg}${ANSI.reset}`);
    if (stack && DEBUG_LEVEL >= 4) console.error(`${ANSI.gray}[${service}] Stack: ${stack}${ANSI.reset}`);
}

export function debug_pipeline(service: string, action: string, details?: Record<string, unknown>): void {
    if (DEBUG_LEVEL < 3) return;
    const detailStr = details ? JSON.stringify(details) : '';
    console.log(`${ANSI.cyan}[${service}]${ANSI.reset} ${action} ${detailStr}`);
}

// Per-call planner chatter, only at DEBUG_LEVEL 4
export function debug_verbose(service: string, action: string, details?: Record<string, unknown>): void {
    if (DEBUG_LEVEL < 4) return;
    const detailStr = details ? JSON.stringify(details) : '';
    console.log(`${ANSI.gray}[${service}] ${action} ${detailStr}${ANSI.reset}`);
}

export function debug_config_warning(label: string, content: string): void {
    if (DEBUG_LEVEL < 2) return;
    console.warn(`${ANSI.yellow}${label}${ANSI.reset} ${content}`);
}
