import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { PromptError } from "./errors.js";

export const TEMPLATE_NAMES = [
    "analysis",
    "coder",
    "designer",
    "researcher",
    "writer",
    "integration",
    "testing",
    "repair",
] as const;
export type TemplateName = (typeof TEMPLATE_NAMES)[number];

const DEFAULT_PRESET = "default";
const moduleDir = path.dirname(fileURLToPath(import.meta.url));
const projectRoot = path.resolve(moduleDir, "..", "..");
const templatesRoot = path.join(projectRoot, "src/templates/prompts");

function readTemplateDir(presetName: string): string {
    const presetDir = path.join(templatesRoot, presetName);
    if (!fs.existsSync(presetDir) || !fs.statSync(presetDir).isDirectory()) {
        throw new PromptError(`Prompt preset not found: ${presetDir}`);
    }
    return presetDir;
}

export type PromptVars = Record<string, string | number>;

/** Replaces `{{name}}`; a placeholder without a value is an error. */
export function renderTemplate(template: string, vars: PromptVars, label = "template"): string {
    const missing = new Set<string>();
    const out = template.replace(/\{\{\s*([A-Za-z_][A-Za-z0-9_]*)\s*\}\}/g, (_match, name: string) => {
        const value = vars[name];
        if (value === undefined) {
            missing.add(name);
            return "";
        }
        return String(value);
    });
    if (missing.size > 0) {
        throw new PromptError(`${label}: no value for ${[...missing].map((m) => `{{${m}}}`).join(", ")}`);
    }
    return out;
}

/** Keeps the head of a long context section and marks the cut. */
export function clip(text: string, maxChars: number): string {
    if (text.length <= maxChars) return text;
    const dropped = text.length - maxChars;
    return `${text.slice(0, maxChars)}\n[... truncated ${dropped} chars]`;
}

export class PromptLibrary {
    private readonly cache = new Map<TemplateName, string>();
    private readonly defaultsDir: string;

    /** `overrideDir` files win; anything missing there comes from the default preset. */
    constructor(private readonly overrideDir?: string, preset = DEFAULT_PRESET) {
        this.defaultsDir = readTemplateDir(preset);
    }

    template(name: TemplateName): string {
        const cached = this.cache.get(name);
        if (cached !== undefined) return cached;
        const file = `${name}.md`;
        const override = this.overrideDir ? path.join(this.overrideDir, file) : undefined;
        const source = override && fs.existsSync(override) ? override : path.join(this.defaultsDir, file);
        if (!fs.existsSync(source)) {
            throw new PromptError(`Prompt template not found: ${source}`);
        }
        const text = fs.readFileSync(source, "utf8");
        this.cache.set(name, text);
        return text;
    }

    render(name: TemplateName, vars: PromptVars): string {
        return renderTemplate(this.template(name), vars, `${name}.md`);
    }
}

/** Copies the preset's templates into `targetDir`; returns the written file names. */
export function installPromptSet(targetDir: string, presetName = DEFAULT_PRESET): string[] {
    const sourceDir = readTemplateDir(presetName);
    const resolved = path.resolve(targetDir);
    fs.mkdirSync(resolved, { recursive: true });
    const written: string[] = [];
    for (const entry of fs.readdirSync(sourceDir).sort()) {
        const src = path.join(sourceDir, entry);
        if (!fs.statSync(src).isFile()) continue;
        fs.copyFileSync(src, path.join(resolved, entry));
        written.push(entry);
    }
    return written;
}
