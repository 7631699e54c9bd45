export function isTestEnv() {
    // JEST_WORKER_ID is set by Jest; also honor NODE_ENV=test
    return !!(process.env.JEST_WORKER_ID || process.env.NODE_ENV === "test");
}

export function readEnv(name: string): string | undefined {
    const v = process.env[name];
    if (v === undefined) return undefined;
    const trimmed = v.trim();
    return trimmed.length ? trimmed : undefined;
}
