/**
 * SHELL: Activation env file
 * Renders the typed activation config into the file `docker compose --env-file` reads.
 */

import nunjucks from 'nunjucks';
import fs from 'fs-extra';
import path from 'path';
import { ActivationConfig, toEnvironment } from '../core/activation';

export const ENV_TEMPLATE = 'activation.env.njk';

/** Resolves to <repo>/templates from both src/shell and dist/shell. */
export const DEFAULT_TEMPLATE_DIR = path.resolve(__dirname, '../../templates');

export class EnvFileRenderer {
    private env: nunjucks.Environment;

    constructor(templateDir: string = DEFAULT_TEMPLATE_DIR) {
        this.env = new nunjucks.Environment(new nunjucks.FileSystemLoader(templateDir), {
            autoescape: false,
            throwOnUndefined: true,
            trimBlocks: true,
            lstripBlocks: true,
        });
    }

    render(config: ActivationConfig): string {
        const env = toEnvironment(config);
        for (const [key, value] of Object.entries(env)) {
            if (/[\r\n]/.test(value)) {
                throw new Error(`Activation value for ${key} spans several lines`);
            }
        }
        return this.env.render(ENV_TEMPLATE, { enclaveName: config.enclaveName, env });
    }

    async write(filePath: string, config: ActivationConfig): Promise<string> {
        const content = this.render(config);
        await fs.ensureDir(path.dirname(filePath));
        await fs.writeFile(filePath, content, 'utf-8');
        return content;
    }
}
