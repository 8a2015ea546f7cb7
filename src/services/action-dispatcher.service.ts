import { Inject, Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { DiscoveryService, Reflector } from '@nestjs/core';
import { ZodError } from 'zod';
import { abort, fatal, recoverable } from '../actions/action-results';
import { AbortRaisedError } from '../errors/abort-raised.error';
import { DuplicateRegistrationError } from '../errors/duplicate-registration.error';
import { TemplateRenderError } from '../errors/template-render.error';
import type { IAbortSignal } from '../interfaces/abort-signal.interface';
import type {
  ActionResult,
  DispatchInput,
  WorkflowActionHandler,
} from '../interfaces/action.interface';
import type { TemplateRenderer } from '../interfaces/template-renderer.interface';
import type {
  JsonValue,
  RunContext,
} from '../interfaces/workflow-definition.interface';
import { errorMessage } from '../utils/error-utils';
import { formatZodError } from '../utils/format-zod-error';
import {
  ABORT_SIGNAL,
  ACTION_PROVIDER_METADATA,
  TEMPLATE_RENDERER,
} from '../workflow.constants';

function isActionHandler(value: unknown): value is WorkflowActionHandler {
  return (
    typeof value === 'object' &&
    value !== null &&
    typeof Reflect.get(value, 'name') === 'string' &&
    typeof Reflect.get(value, 'execute') === 'function'
  );
}

/**
 * Looks up action handlers by name and runs them, turning every outcome,
 * thrown errors included, into an ActionResult.
 */
@Injectable()
export class ActionDispatcher implements OnModuleInit {
  private readonly logger = new Logger(ActionDispatcher.name);
  private readonly handlers = new Map<string, WorkflowActionHandler>();

  constructor(
    private readonly discoveryService: DiscoveryService,
    private readonly reflector: Reflector,
    @Inject(ABORT_SIGNAL) private readonly abortSignal: IAbortSignal,
    @Inject(TEMPLATE_RENDERER) private readonly renderer: TemplateRenderer,
  ) {}

  onModuleInit(): void {
    for (const wrapper of this.discoveryService.getProviders()) {
      if (!wrapper.metatype) continue;

      const marked = this.reflector.get<boolean | undefined>(
        ACTION_PROVIDER_METADATA,
        wrapper.metatype,
      );
      if (!marked) continue;

      const instance: unknown = wrapper.instance;
      if (!isActionHandler(instance)) {
        this.logger.warn(
          `${wrapper.metatype.name} is marked as an action provider but is not a static action handler`,
        );
        continue;
      }
      this.register(instance);
    }
  }

  register(handler: WorkflowActionHandler): void {
    const existing = this.handlers.get(handler.name);
    if (existing) {
      throw new DuplicateRegistrationError(
        'action',
        handler.name,
        existing.constructor.name,
        handler.constructor.name,
      );
    }
    this.handlers.set(handler.name, handler);
    this.logger.debug(`Registered action: ${handler.name}`);
  }

  has(name: string): boolean {
    return this.handlers.has(name);
  }

  get(name: string): WorkflowActionHandler | undefined {
    return this.handlers.get(name);
  }

  getAll(): WorkflowActionHandler[] {
    return Array.from(this.handlers.values());
  }

  async dispatch(name: string, input: DispatchInput): Promise<ActionResult> {
    const handler = this.handlers.get(name);
    if (!handler) {
      return fatal(`Unknown action '${name}'`, 'unknown-action');
    }

    let args = input.args;
    if (input.renderArgs !== false) {
      try {
        args = await this.renderArgs(input.args, input.context);
      } catch (error) {
        const message = `Failed to render arguments for action '${name}': ${errorMessage(error)}`;
        if (!(error instanceof TemplateRenderError)) {
          this.logger.warn(`${message} (run ${input.runId}, state ${input.state})`);
        }
        return recoverable(message);
      }
    }

    try {
      return await handler.execute({
        runId: input.runId,
        state: input.state,
        args,
        context: input.context,
        abortSignal: this.abortSignal,
      });
    } catch (error) {
      if (error instanceof AbortRaisedError) {
        return abort(error.message, error.reason);
      }
      if (error instanceof ZodError) {
        return fatal(
          `Invalid arguments for action '${name}': ${formatZodError(error)}`,
          'invalid-arguments',
        );
      }
      const message = `Action '${name}' failed: ${errorMessage(error)}`;
      this.logger.error(
        `${message} (run ${input.runId}, state ${input.state})`,
        error instanceof Error ? error.stack : undefined,
      );
      return fatal(message, 'action-error');
    }
  }

  private async renderArgs(
    args: Record<string, JsonValue>,
    context: Readonly<RunContext>,
  ): Promise<Record<string, JsonValue>> {
    const rendered: [string, JsonValue][] = [];
    for (const [key, value] of Object.entries(args)) {
      rendered.push([key, await this.renderValue(value, context)]);
    }
    return Object.fromEntries(rendered);
  }

  private async renderValue(
    value: JsonValue,
    context: Readonly<RunContext>,
  ): Promise<JsonValue> {
    if (typeof value === 'string') {
      return value.includes('{') ? this.renderer.render(value, context) : value;
    }
    if (Array.isArray(value)) {
      const items: JsonValue[] = [];
      for (const item of value) {
        items.push(await this.renderValue(item, context));
      }
      return items;
    }
    if (value !== null && typeof value === 'object') {
      return this.renderArgs(value, context);
    }
    return value;
  }
}
