import * as z from "zod";
import { MODEL_ALIASES } from "../core/config/model-factory.js";

// ── Config sub-schemas (per-graph settings) ─────────────────────────

export const ModelConfigSchema = z.object({
  model: z.string().min(1),
  temperature: z.number().min(0).max(2).default(0.4),
  maxRetries: z.number().int().min(0).default(1),
});

export const ModelAliasSchema = z.enum(MODEL_ALIASES);

export const PromptDefSchema = z.object({
  system: z.string().min(1),
  user: z.string().min(1),
});

export const GraphConfigSchema = z.object({
  models: z.record(ModelAliasSchema, ModelConfigSchema).default({}),
  aiPrompts: z.record(z.string(), PromptDefSchema).default({}),
  strings: z.record(z.string(), z.string()).default({}),
});

// ── Node / transition schemas ───────────────────────────────────────

export const NodeKindSchema = z.enum(["analysis", "router", "task", "terminal"]);

export const NodeDefSchema = z.object({
  id: z.string().min(1),
  kind: NodeKindSchema,
  handlerRef: z.string().min(1),
  promptRef: z.string().min(1),
  modelAlias: ModelAliasSchema.default("drafting"),
  description: z.string().optional(),
});

export const StaticTransitionSchema = z.object({
  from: z.string().min(1),
  to: z.string().min(1),
});

export const ConditionalTransitionSchema = z.object({
  from: z.string().min(1),
  routerRef: z.string().min(1),
  destinations: z.record(z.string(), z.string()),
});

export const GraphDslSchema = z.object({
  graph: z.object({
    graphId: z.string().min(1),
    version: z.string().min(1),
    description: z.string().optional(),
    entrypoint: z.string().min(1),
  }),
  stateContractRef: z.string().min(1),
  nodes: z.array(NodeDefSchema).min(1),
  transitions: z.object({
    static: z.array(StaticTransitionSchema).default([]),
    conditional: z.array(ConditionalTransitionSchema).default([]),
  }),
  config: GraphConfigSchema.default({}),
});

export type GraphDsl = z.infer<typeof GraphDslSchema>;
export type GraphConfig = z.infer<typeof GraphConfigSchema>;
export type NodeDef = z.infer<typeof NodeDefSchema>;
export type NodeKind = z.infer<typeof NodeKindSchema>;
export type StaticTransition = z.infer<typeof StaticTransitionSchema>;
export type ConditionalTransition = z.infer<typeof ConditionalTransitionSchema>;
export type ModelConfigDef = z.infer<typeof ModelConfigSchema>;
export type PromptDef = z.infer<typeof PromptDefSchema>;
