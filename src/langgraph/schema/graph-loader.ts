import { readFileSync } from "node:fs";
import { parse as parseYaml } from "yaml";
import { GraphDslSchema } from "./graph-dsl-types.js";
import type { GraphDsl } from "./graph-dsl-types.js";
import { compileGraphFromDsl } from "./graph-compiler.js";
import type { CompiledEmailGraph } from "./graph-compiler.js";
import type { HandlerRegistry } from "./handler-registry.js";

/**
 * Parses and validates a YAML file against the flow definition schema.
 * Returns the validated DSL object without compiling.
 */
export function loadGraphDsl(filePath: string): GraphDsl {
  const raw = readFileSync(filePath, "utf-8");
  return parseGraphDslFromText(raw);
}

/**
 * Parses raw YAML text (not a file path) into a validated GraphDsl.
 * Useful for testing without filesystem access.
 */
export function parseGraphDslFromText(yamlText: string): GraphDsl {
  const parsed: unknown = parseYaml(yamlText);
  return GraphDslSchema.parse(parsed);
}

/**
 * Loads a YAML graph definition, validates it, and compiles it into a
 * runnable LangGraph StateGraph instance.
 */
export function loadAndCompileGraph(filePath: string, registry: HandlerRegistry): CompiledEmailGraph {
  return compileGraphFromDsl(loadGraphDsl(filePath), registry);
}
