import { StateGraph, START, END } from "@langchain/langgraph";
import {
  EmailStateAnnotation,
  type EmailGraphState,
  type EmailGraphUpdate,
} from "../state.js";
import { MODEL_ALIASES, setModelConfig } from "../core/config/model-factory.js";
import { ownEntry } from "../core/helpers/state.js";
import type { StageBinding } from "../core/nodes/stage-context.js";
import type { GraphDsl, NodeDef } from "./graph-dsl-types.js";
import type { HandlerRegistry } from "./handler-registry.js";

const SUPPORTED_STATE_CONTRACTS = ["state.EmailStateSchema"];
const END_REF = "__end__";

// Node ids come from the flow file, so the builder is typed with `string` node names.
type EmailGraphBuilder = StateGraph<
  typeof EmailStateAnnotation.spec,
  EmailGraphState,
  EmailGraphUpdate,
  string
>;

export type CompiledEmailGraph = ReturnType<EmailGraphBuilder["compile"]>;

function toTarget(ref: string): string {
  return ref === END_REF ? END : ref;
}

/**
 * Validates a parsed GraphDsl against the handler/router registry, the declared nodes,
 * the prompt set and the known state contracts. Throws on any unresolvable reference.
 */
export function preflight(dsl: GraphDsl, registry: HandlerRegistry): void {
  if (!SUPPORTED_STATE_CONTRACTS.includes(dsl.stateContractRef)) {
    throw new Error(
      `Unknown stateContractRef "${dsl.stateContractRef}". ` +
      `Supported: ${SUPPORTED_STATE_CONTRACTS.join(", ")}`
    );
  }

  const nodeIds = new Set(dsl.nodes.map((n) => n.id));
  if (nodeIds.size !== dsl.nodes.length) {
    throw new Error(`Graph "${dsl.graph.graphId}" declares the same node id more than once.`);
  }

  if (!nodeIds.has(dsl.graph.entrypoint)) {
    throw new Error(`Entrypoint "${dsl.graph.entrypoint}" is not a declared node.`);
  }

  for (const node of dsl.nodes) {
    registry.resolveHandler(node.handlerRef);
    if (!ownEntry(dsl.config.aiPrompts, node.promptRef)) {
      throw new Error(`Node "${node.id}" references missing prompt "${node.promptRef}".`);
    }
  }

  for (const ct of dsl.transitions.conditional) {
    if (!nodeIds.has(ct.from)) {
      throw new Error(`Conditional transition "from" node "${ct.from}" is not declared.`);
    }
    registry.resolveRouter(ct.routerRef);
    for (const dest of Object.values(ct.destinations)) {
      if (dest !== END_REF && !nodeIds.has(dest)) {
        throw new Error(`Conditional destination "${dest}" is not a declared node.`);
      }
    }
  }

  for (const st of dsl.transitions.static) {
    if (!nodeIds.has(st.from)) {
      throw new Error(`Static transition "from" node "${st.from}" is not declared.`);
    }
    if (st.to !== END_REF && !nodeIds.has(st.to)) {
      throw new Error(`Static transition "to" node "${st.to}" is not declared.`);
    }
  }
}

function bindingFor(dsl: GraphDsl, node: NodeDef): StageBinding {
  const prompt = ownEntry(dsl.config.aiPrompts, node.promptRef);
  if (!prompt) throw new Error(`Node "${node.id}" references missing prompt "${node.promptRef}".`);
  return {
    nodeId: node.id,
    prompt,
    modelAlias: node.modelAlias,
    strings: dsl.config.strings,
  };
}

/**
 * Compiles a validated GraphDsl into a runnable LangGraph StateGraph. Model aliases
 * declared under `config.models` are registered with the model factory first.
 */
export function compileGraphFromDsl(dsl: GraphDsl, registry: HandlerRegistry): CompiledEmailGraph {
  preflight(dsl, registry);

  for (const alias of MODEL_ALIASES) {
    const config = dsl.config.models[alias];
    if (config) setModelConfig(alias, config);
  }

  const graph: EmailGraphBuilder = new StateGraph<
    typeof EmailStateAnnotation.spec,
    EmailGraphState,
    EmailGraphUpdate,
    string
  >(EmailStateAnnotation);

  for (const node of dsl.nodes) {
    const handler = registry.resolveHandler(node.handlerRef)(bindingFor(dsl, node));
    graph.addNode(node.id, handler);
  }

  graph.addEdge(START, dsl.graph.entrypoint);

  for (const ct of dsl.transitions.conditional) {
    const router = registry.resolveRouter(ct.routerRef);
    const destMap: Record<string, string> = {};
    for (const [key, value] of Object.entries(ct.destinations)) {
      destMap[key] = toTarget(value);
    }
    graph.addConditionalEdges(ct.from, router, destMap);
  }

  for (const st of dsl.transitions.static) {
    graph.addEdge(st.from, toTarget(st.to));
  }

  return graph.compile();
}
