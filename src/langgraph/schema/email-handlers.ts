import { contextAnalyzer } from "../core/nodes/context-analyzer.js";
import { emailRouter } from "../core/nodes/router.js";
import { emailComposer } from "../core/nodes/composer.js";
import { emailAnalyzer } from "../core/nodes/analyzer.js";
import { emailSummarizer } from "../core/nodes/summarizer.js";
import { responseGenerator } from "../core/nodes/response-generator.js";
import type { StageContext, StageDeps } from "../core/nodes/stage-context.js";
import { routeByTask } from "../core/routing/routing-policy.js";
import type { EmailState, EmailStateUpdate } from "../state.js";
import type { HandlerFactory, HandlerRegistry } from "./handler-registry.js";

type Stage = (state: EmailState, ctx: StageContext) => Promise<EmailStateUpdate>;

function bindStage(stage: Stage, deps: StageDeps): HandlerFactory {
  return (binding) => (state) => stage(state, { ...deps, binding });
}

export function registerEmailHandlers(registry: HandlerRegistry, deps: StageDeps): void {
  // Stages
  registry.registerHandler("stages.contextAnalyzer", bindStage(contextAnalyzer, deps));
  registry.registerHandler("stages.router", bindStage(emailRouter, deps));
  registry.registerHandler("stages.composer", bindStage(emailComposer, deps));
  registry.registerHandler("stages.analyzer", bindStage(emailAnalyzer, deps));
  registry.registerHandler("stages.summarizer", bindStage(emailSummarizer, deps));
  registry.registerHandler("stages.responseGenerator", bindStage(responseGenerator, deps));

  // Conditional edge dispatchers
  registry.registerRouter("routing.byCurrentTask", routeByTask);
}
