import fs from "node:fs";
import path from "node:path";

export function ensureDir(p: string) {
    fs.mkdirSync(p, { recursive: true });
}

export function writeFileUtf8(p: string, text: string) {
    ensureDir(path.dirname(p));
    fs.writeFileSync(p, text, "utf8");
}

export function writeJson(p: string, value: unknown) {
    writeFileUtf8(p, JSON.stringify(value, null, 2) + "\n");
}

export function toPosix(value: string): string {
    return value.replace(/\\+/g, "/");
}

export function createRunDir(base: string) {
    let ts = Date.now();
    // two runs started within the same millisecond must not share a directory
    while (fs.existsSync(path.join(base, `run-${ts}`))) ts += 1;
    const dir = path.join(base, `run-${ts}`);
    ensureDir(dir);
    return dir;
}

export function findLatestRunDir(base: string): string | null {
    if (!fs.existsSync(base)) return null;
    const names = fs
        .readdirSync(base)
        .filter((n) => n.startsWith("run-"))
        .map((n) => ({ n, t: Number(n.slice("run-".length)) }))
        .filter((x) => !Number.isNaN(x.t))
        .sort((a, b) => b.t - a.t);
    if (names.length === 0) return null;
    return path.join(base, names[0].n);
}

export function isSafeRelativeUnder(base: string, rel: string): boolean {
    if (!rel || rel.trim() === "") return false;
    if (path.isAbsolute(rel) || path.win32.isAbsolute(rel)) return false;
    const normalizedBase = path.resolve(base);
    const target = path.resolve(normalizedBase, rel);
    const relative = path.relative(normalizedBase, target);
    if (!relative) return false;
    return !relative.startsWith("..") && !path.isAbsolute(relative);
}

/** Normalises a model-supplied path; throws when it would escape the project. */
export function assertSafeRelative(targetPath: string): string {
    const trimmed = targetPath.trim().replace(/^\.\/+/, "");
    if (!trimmed) {
        throw new Error("empty output path");
    }
    if (path.isAbsolute(trimmed) || path.win32.isAbsolute(trimmed)) {
        throw new Error(`refusing to write outside the project: ${targetPath}`);
    }
    const segments = trimmed.split(/[\\/]/);
    if (segments.some((segment) => segment === "..")) {
        throw new Error(`output path contains '..': ${targetPath}`);
    }
    return toPosix(trimmed);
}
