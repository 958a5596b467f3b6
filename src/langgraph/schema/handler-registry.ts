import type { EmailState } from "../state.js";
import type { NodeHandler, StageBinding } from "../core/nodes/stage-context.js";

// Handlers are registered as factories: the compiler binds each one to its node's prompt and model.
export type HandlerFactory = (binding: StageBinding) => NodeHandler;
export type RouterFn = (state: EmailState) => string;

/**
 * Maps the string refs used in a flow file to the functions that implement them.
 * One registry per assistant, so each carries its own generation client and clock.
 */
export class HandlerRegistry {
  private readonly handlers = new Map<string, HandlerFactory>();
  private readonly routers = new Map<string, RouterFn>();

  registerHandler(ref: string, factory: HandlerFactory): void {
    this.handlers.set(ref, factory);
  }

  registerRouter(ref: string, fn: RouterFn): void {
    this.routers.set(ref, fn);
  }

  resolveHandler(ref: string): HandlerFactory {
    const factory = this.handlers.get(ref);
    if (!factory) throw new Error(`Handler not registered: "${ref}". Call the appropriate registration function first.`);
    return factory;
  }

  resolveRouter(ref: string): RouterFn {
    const fn = this.routers.get(ref);
    if (!fn) throw new Error(`Router not registered: "${ref}". Call the appropriate registration function first.`);
    return fn;
  }

  getRegisteredHandlerIds(): string[] {
    return [...this.handlers.keys()];
  }

  getRegisteredRouterIds(): string[] {
    return [...this.routers.keys()];
  }
}
