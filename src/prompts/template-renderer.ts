import Handlebars from 'handlebars';
import { readFileSync, existsSync } from 'fs';
import { join, dirname } from 'path';
import { fileURLToPath } from 'url';
import type { Chunk } from '../chunking/types';
import { ConfigError } from '../errors/index';

export const FAQ_GENERATION_TEMPLATE = 'faq-generation.md';

export interface TemplateContext {
    MAX_FAQS: number;
    CHUNK_INDEX: number;
    HAS_OVERLAP: boolean;
    OVERLAP_CHARS: number;
    [key: string]: unknown;
}

// Sources keep templates beside this file; the bundled build copies them to prompts/templates
function defaultTemplateDir(): string {
    const here = dirname(fileURLToPath(import.meta.url));
    const beside = join(here, 'templates');
    if (existsSync(beside)) {
        return beside;
    }
    return join(here, 'prompts', 'templates');
}

export class TemplateRenderer {
    private templateDir: string;
    private cache = new Map<string, Handlebars.TemplateDelegate>();

    constructor(templateDir?: string) {
        this.templateDir = templateDir ?? defaultTemplateDir();
    }

    /**
     * Render a template with the given context
     */
    public render(templateName: string, context: TemplateContext): string {
        return this.compile(templateName)(context);
    }

    public createContext(chunk: Chunk, maxFaqs: number): TemplateContext {
        return {
            MAX_FAQS: maxFaqs,
            CHUNK_INDEX: chunk.index,
            HAS_OVERLAP: chunk.overlapWithPrev > 0,
            OVERLAP_CHARS: chunk.overlapWithPrev,
        };
    }

    private compile(templateName: string): Handlebars.TemplateDelegate {
        const cached = this.cache.get(templateName);
        if (cached) {
            return cached;
        }

        const templatePath = join(this.templateDir, templateName);
        if (!existsSync(templatePath)) {
            throw new ConfigError(`Template not found: ${templatePath}`);
        }

        const template = Handlebars.compile(readFileSync(templatePath, 'utf-8'), { noEscape: true });
        this.cache.set(templateName, template);
        return template;
    }
}
