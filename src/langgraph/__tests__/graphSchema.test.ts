import { buildEmailGraph, createInitialState, DEFAULT_FLOW_PATH, runTurn } from "../graph.js";
import { HandlerRegistry } from "../schema/handler-registry.js";
import { registerEmailHandlers } from "../schema/email-handlers.js";
import { loadGraphDsl, parseGraphDslFromText } from "../schema/graph-loader.js";
import { compileGraphFromDsl, preflight } from "../schema/graph-compiler.js";
import type { GraphDsl } from "../schema/graph-dsl-types.js";
import { quietDefaults, ScriptedGenerationClient } from "./helpers/scriptedClient.js";

const clock = () => new Date("2024-03-01T09:00:00.000Z");

function registryWith(client = new ScriptedGenerationClient()): HandlerRegistry {
  const registry = new HandlerRegistry();
  registerEmailHandlers(registry, { client, clock });
  return registry;
}

function flowDsl(): GraphDsl {
  return structuredClone(loadGraphDsl(DEFAULT_FLOW_PATH));
}

beforeEach(() => {
  jest.spyOn(console, "warn").mockImplementation(() => undefined);
  jest.spyOn(console, "error").mockImplementation(() => undefined);
});

// ---------------------------------------------------------------------------
// 1. DSL Schema Validation
// ---------------------------------------------------------------------------
describe("GraphDSL schema validation", () => {
  it("parses the email assistant flow without errors", () => {
    const dsl = loadGraphDsl(DEFAULT_FLOW_PATH);
    expect(dsl.graph.graphId).toBe("email-assistant");
    expect(dsl.graph.entrypoint).toBe("context_analysis");
    expect(dsl.nodes.map((n) => n.id)).toEqual([
      "context_analysis",
      "route_request",
      "compose_email",
      "analyze_email",
      "summarize_email",
      "generate_response",
    ]);
    expect(dsl.config.strings.responseFallback).toBe(
      "I could not put together a reply just now. Please try again in a moment."
    );
  });

  it("rejects YAML missing required graph fields", () => {
    const bad = `
nodes:
  - id: a
    kind: task
    handlerRef: "x"
    promptRef: "p"
transitions: {}
stateContractRef: "state.EmailStateSchema"
`;
    expect(() => parseGraphDslFromText(bad)).toThrow();
  });

  it("rejects YAML with unknown node kind", () => {
    const bad = `
graph:
  graphId: test
  version: "1.0"
  entrypoint: a
stateContractRef: "state.EmailStateSchema"
nodes:
  - id: a
    kind: question
    handlerRef: "x"
    promptRef: "p"
transitions: {}
`;
    expect(() => parseGraphDslFromText(bad)).toThrow();
  });

  it.each([
    ["a node", "    modelAlias: creative\n", ""],
    ["config.models", "", "config:\n  models:\n    creative:\n      model: gpt-4o\n"],
  ])("rejects an unknown model alias on %s", (_where, nodeExtra, configBlock) => {
    const bad =
      "graph:\n  graphId: test\n  version: \"1.0\"\n  entrypoint: a\n" +
      'stateContractRef: "state.EmailStateSchema"\n' +
      "nodes:\n  - id: a\n    kind: terminal\n    handlerRef: x\n    promptRef: p\n" +
      nodeExtra +
      "transitions: {}\n" +
      configBlock;
    expect(() => parseGraphDslFromText(bad)).toThrow();
  });

  it("defaults the model alias and empty config sections", () => {
    const dsl = parseGraphDslFromText(`
graph:
  graphId: test
  version: "1.0"
  entrypoint: a
stateContractRef: "state.EmailStateSchema"
nodes:
  - id: a
    kind: terminal
    handlerRef: "stages.responseGenerator"
    promptRef: "p"
transitions: {}
`);
    expect(dsl.nodes[0].modelAlias).toBe("drafting");
    expect(dsl.transitions).toEqual({ static: [], conditional: [] });
    expect(dsl.config).toEqual({ models: {}, aiPrompts: {}, strings: {} });
  });
});

// ---------------------------------------------------------------------------
// 2. Handler Registry and preflight
// ---------------------------------------------------------------------------
describe("handler registry", () => {
  it("registers every stage and the task router", () => {
    const registry = registryWith();
    expect(registry.getRegisteredHandlerIds()).toEqual([
      "stages.contextAnalyzer",
      "stages.router",
      "stages.composer",
      "stages.analyzer",
      "stages.summarizer",
      "stages.responseGenerator",
    ]);
    expect(registry.getRegisteredRouterIds()).toEqual(["routing.byCurrentTask"]);
  });

  it("throws for unregistered refs", () => {
    const registry = new HandlerRegistry();
    expect(() => registry.resolveHandler("stages.missing")).toThrow('Handler not registered: "stages.missing"');
    expect(() => registry.resolveRouter("routing.missing")).toThrow('Router not registered: "routing.missing"');
  });
});

describe("preflight", () => {
  it("accepts the shipped flow", () => {
    expect(() => preflight(flowDsl(), registryWith())).not.toThrow();
  });

  it("rejects an unknown state contract", () => {
    const dsl = flowDsl();
    dsl.stateContractRef = "state.OtherSchema";
    expect(() => preflight(dsl, registryWith())).toThrow('Unknown stateContractRef "state.OtherSchema"');
  });

  it("rejects an entrypoint that is not a node", () => {
    const dsl = flowDsl();
    dsl.graph.entrypoint = "start_here";
    expect(() => preflight(dsl, registryWith())).toThrow('Entrypoint "start_here" is not a declared node.');
  });

  it("rejects handlers nobody registered", () => {
    expect(() => preflight(flowDsl(), new HandlerRegistry())).toThrow(
      'Handler not registered: "stages.contextAnalyzer"'
    );
  });

  it("rejects a node whose prompt is missing", () => {
    const dsl = flowDsl();
    delete dsl.config.aiPrompts.composeEmail;
    expect(() => preflight(dsl, registryWith())).toThrow(
      'Node "compose_email" references missing prompt "composeEmail".'
    );
  });

  it("rejects a conditional destination that is not a node", () => {
    const dsl = flowDsl();
    dsl.transitions.conditional[0].destinations.schedule_meeting = "schedule_meeting";
    expect(() => preflight(dsl, registryWith())).toThrow('Conditional destination "schedule_meeting" is not a declared node.');
  });

  it("rejects a static transition to an undeclared node", () => {
    const dsl = flowDsl();
    dsl.transitions.static.push({ from: "generate_response", to: "archive" });
    expect(() => preflight(dsl, registryWith())).toThrow('Static transition "to" node "archive" is not declared.');
  });

  it("rejects duplicate node ids", () => {
    const dsl = flowDsl();
    dsl.nodes.push({ ...dsl.nodes[0] });
    expect(() => compileGraphFromDsl(dsl, registryWith())).toThrow("declares the same node id more than once");
  });
});

// ---------------------------------------------------------------------------
// 3. Compiled graph behavior
// ---------------------------------------------------------------------------
describe("compiled email graph", () => {
  it.each([
    ["compose", "compose_email"],
    ["analyze_email", "analyze_email"],
    ["Summarize", "summarize_email"],
  ])("routes %j through %s before the response", async (label, stage) => {
    const client = new ScriptedGenerationClient(quietDefaults(label));
    const graph = buildEmailGraph({ client, clock });

    await runTurn(graph, createInitialState(), "Help me with the launch thread");

    expect(client.runNames()).toEqual(["context_analysis", "route_request", stage, "generate_response"]);
  });

  it.each(["generate_response", "respond", "schedule_meeting", ""])(
    "sends %j straight to the response stage exactly once",
    async (label) => {
      const client = new ScriptedGenerationClient(quietDefaults(label));
      const graph = buildEmailGraph({ client, clock });

      await runTurn(graph, createInitialState(), "Thanks!");

      expect(client.runNames()).toEqual(["context_analysis", "route_request", "generate_response"]);
    }
  );

  it("appends the user turn and the reply and leaves the input state untouched", async () => {
    const client = new ScriptedGenerationClient(quietDefaults("generate_response"));
    const graph = buildEmailGraph({ client, clock });
    const initial = createInitialState();

    const result = await runTurn(graph, initial, "Draft a thank-you note");

    expect(result.messages).toEqual([
      { role: "user", content: "Draft a thank-you note" },
      { role: "assistant", content: "Reply text" },
    ]);
    expect(result.current_task).toBe("generate_response");
    expect(initial.messages).toEqual([]);
    expect(initial.drafts).toEqual({});
  });

  it("drops the previous turn's messages and trace", async () => {
    const client = new ScriptedGenerationClient(quietDefaults("generate_response"));
    const graph = buildEmailGraph({ client, clock });
    const previous = {
      ...createInitialState(),
      messages: [
        { role: "user" as const, content: "Earlier question" },
        { role: "assistant" as const, content: "Earlier answer" },
      ],
      reason_trace: ["generate_response:ok"],
    };

    const result = await runTurn(graph, previous, "Next question");

    expect(result.messages).toEqual([
      { role: "user", content: "Next question" },
      { role: "assistant", content: "Reply text" },
    ]);
    expect(result.reason_trace).toEqual([
      "context_analysis:ok",
      "route_request:ok",
      "route_request:task:generate_response",
      "generate_response:ok",
    ]);
    expect(previous.messages).toHaveLength(2);
  });

  it("keeps going when every structured reply is malformed", async () => {
    const client = new ScriptedGenerationClient({
      context_analysis: "not json at all",
      route_request: "analyze",
      analyze_email: "{unterminated",
      generate_response: "Here is my reply.",
    });
    const graph = buildEmailGraph({ client, clock });

    const result = await runTurn(graph, createInitialState(), "Analyze the budget thread");

    expect(result.messages.at(-1)).toEqual({ role: "assistant", content: "Here is my reply." });
    expect(result.memory).toEqual({});
    expect(result.email_stats).toEqual({});
    expect(result.reason_trace).toEqual([
      "context_analysis:parse_fail",
      "route_request:ok",
      "route_request:task:analyze_email",
      "analyze_email:parse_fail",
      "generate_response:ok",
    ]);
  });

  it("uses the flow's prompts and model aliases", async () => {
    const client = new ScriptedGenerationClient(quietDefaults("generate_response"));
    const graph = buildEmailGraph({ client, clock });

    await runTurn(graph, createInitialState(), "Ping");

    expect(client.callsFor("route_request")[0]).toMatchObject({
      modelAlias: "routing",
      messages: [
        {
          role: "system",
          content:
            "Pick the one task that best serves the request. Reply with exactly one label\n" +
            "from this list and nothing else: compose_email, analyze_email, summarize_email, generate_response.",
        },
        { role: "user", content: "Ping" },
      ],
    });
  });
});
