import { Inject, Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { readdir, readFile } from 'node:fs/promises';
import { basename, extname, join } from 'node:path';
import { rolloutConfig, RolloutConfig } from '../config/rollout.config';
import { bindValues, CommandTemplate, parseTemplate, render, RenderedCommand } from './command-template';
import { RenderError } from './render.error';

const TEMPLATE_EXTENSION = '.sh';

/**
 * Named command templates, loaded from `*.sh` files in the template directory at startup.
 * Rendering is pure: nothing here touches the network.
 */
@Injectable()
export class CommandTemplateService implements OnModuleInit {
  private readonly logger = new Logger(CommandTemplateService.name);
  private readonly templates = new Map<string, CommandTemplate>();

  constructor(@Inject(rolloutConfig.KEY) private readonly config: RolloutConfig) {}

  async onModuleInit(): Promise<void> {
    await this.loadDirectory(this.config.templateDir);
    this.logger.log(`Command templates from ${this.config.templateDir}: ${this.names().join(', ')}`);
  }

  /** Register every template file in dir; the file name without extension is the template name. */
  async loadDirectory(dir: string): Promise<string[]> {
    const files = (await readdir(dir)).filter((f) => extname(f) === TEMPLATE_EXTENSION).sort();
    for (const file of files) {
      const body = await readFile(join(dir, file), 'utf8');
      this.register(parseTemplate(basename(file, TEMPLATE_EXTENSION), body));
    }
    return files.map((f) => basename(f, TEMPLATE_EXTENSION));
  }

  register(template: CommandTemplate): void {
    this.templates.set(template.name, template);
  }

  names(): string[] {
    return [...this.templates.keys()].sort();
  }

  get(name: string): CommandTemplate {
    const template = this.templates.get(name);
    if (!template) throw new RenderError('UnknownTemplate', name, name);
    return template;
  }

  render(name: string, bindings: Readonly<Record<string, unknown>>): RenderedCommand {
    return render(this.get(name), bindings);
  }

  /** Throws the RenderError render() would, without building the command. */
  validate(name: string, bindings: Readonly<Record<string, unknown>>): void {
    bindValues(this.get(name), bindings);
  }
}
