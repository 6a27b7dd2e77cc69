import { z } from "zod";
import type { JsonObject } from "../../core/interactions.js";
import type { AIRuntimeMessage } from "../../core/messages.js";
import { errorMessage } from "../../utils/log.js";
import { toolFailure } from "../registry.js";
import type { AITool, AIToolProvider, ToolRuntime } from "../types.js";

export interface CanvasQuery {
  /** Attribute tokens such as `+error` or `-previewoff` */
  attrFilters: string[];
  categoryFilter: string[];
  typeFilter: string[];
  guidFilter: string[];
  connectionDepth: number;
  includeMetadata: boolean;
  includeRuntimeData: boolean;
}

export interface CanvasPutResult {
  /** Instance ids of the placed components */
  placed: string[];
  messages?: AIRuntimeMessage[];
}

export interface CanvasPoint {
  x: number;
  y: number;
}

/**
 * Document access offered by the host application. The tools below only
 * translate between tool arguments and these calls.
 */
export interface CanvasHost {
  /** GhJSON document of the components matching the query */
  getDocument(query: CanvasQuery, signal: AbortSignal): Promise<JsonObject>;
  putDocument(document: JsonObject, options: { editMode: boolean }, signal: AbortSignal): Promise<CanvasPutResult>;
  /** Arrange components in a grid; returns the ids actually moved */
  tidyUp(guids: string[], startPoint: CanvasPoint | undefined, signal: AbortSignal): Promise<string[]>;
}

const tokenList = z.array(z.string()).nullish();

const ghGetArgsSchema = z.object({
  attrFilters: tokenList,
  categoryFilter: tokenList,
  typeFilter: tokenList,
  guidFilter: tokenList,
  connectionDepth: z.number().int().min(0).nullish(),
  includeMetadata: z.boolean().nullish(),
  includeRuntimeData: z.boolean().nullish(),
});

const ghPutArgsSchema = z.object({
  ghjson: z.string().nullish(),
  editMode: z.boolean().nullish(),
});

const ghDocumentSchema = z
  .object({
    components: z.array(z.record(z.unknown())),
  })
  .passthrough();

const ghTidyUpArgsSchema = z.object({
  guids: tokenList,
  startPoint: z.object({ x: z.number(), y: z.number() }).nullish(),
});

function countComponents(document: JsonObject): number {
  const components = document["components"];
  return Array.isArray(components) ? components.length : 0;
}

function filterDescription(what: string): JsonObject {
  return {
    type: "array",
    items: { type: "string" },
    description: what,
  };
}

export function createGhGetTool(host: CanvasHost): AITool {
  return {
    name: "gh_get",
    description:
      "Read the current Grasshopper file with optional filters. By default, it returns all components. Returns a GhJSON structure of the file.",
    category: "Components",
    parameters: {
      type: "object",
      properties: {
        attrFilters: filterDescription(
          "Attribute filter tokens. '+' includes, '-' excludes: selected, unselected, enabled, disabled, error, warning, remark, previewcapable, notpreviewcapable, previewon, previewoff.",
        ),
        categoryFilter: filterDescription("Grasshopper category or subcategory tokens, e.g. ['+Vector','-Curve']."),
        typeFilter: filterDescription(
          "Type tokens: params, components, startnodes, endnodes, middlenodes, isolatednodes.",
        ),
        guidFilter: filterDescription("Component GUIDs to start from. All components when omitted."),
        connectionDepth: {
          type: "integer",
          default: 0,
          description: "Depth of connected components to include around the matches.",
        },
        includeMetadata: { type: "boolean", default: false, description: "Include document metadata." },
        includeRuntimeData: {
          type: "boolean",
          default: false,
          description: "Include the values currently flowing through component outputs. This is token-expansive!",
        },
      },
    },
    async execute(args: JsonObject, runtime: ToolRuntime): Promise<JsonObject> {
      const parsed = ghGetArgsSchema.safeParse(args);
      if (!parsed.success) {
        return toolFailure(`Invalid arguments: ${parsed.error.message}`);
      }

      const query: CanvasQuery = {
        attrFilters: parsed.data.attrFilters ?? [],
        categoryFilter: parsed.data.categoryFilter ?? [],
        typeFilter: parsed.data.typeFilter ?? [],
        guidFilter: parsed.data.guidFilter ?? [],
        connectionDepth: parsed.data.connectionDepth ?? 0,
        includeMetadata: parsed.data.includeMetadata ?? false,
        includeRuntimeData: parsed.data.includeRuntimeData ?? false,
      };

      const document = await host.getDocument(query, runtime.signal);
      return {
        success: true,
        ghjson: JSON.stringify(document),
        componentCount: countComponents(document),
      };
    },
  };
}

export function createGhPutTool(host: CanvasHost): AITool {
  return {
    name: "gh_put",
    description:
      "Add new components to the canvas from GhJSON format. Use this to create component networks, add missing components, or build parametric definitions.",
    category: "Components",
    parameters: {
      type: "object",
      properties: {
        ghjson: { type: "string", description: "GhJSON document string" },
        editMode: {
          type: "boolean",
          description: "When true, existing components on canvas will be replaced.",
        },
      },
      required: ["ghjson"],
    },
    async execute(args: JsonObject, runtime: ToolRuntime): Promise<JsonObject> {
      const parsed = ghPutArgsSchema.safeParse(args);
      if (!parsed.success) {
        return toolFailure(`Invalid arguments: ${parsed.error.message}`);
      }
      if (!parsed.data.ghjson?.trim()) {
        return toolFailure("Missing required 'ghjson' parameter.");
      }

      let json: unknown;
      try {
        json = JSON.parse(parsed.data.ghjson);
      } catch (err) {
        return toolFailure(`Invalid GhJSON: ${errorMessage(err)}`);
      }
      const document = ghDocumentSchema.safeParse(json);
      if (!document.success) {
        return toolFailure(`Invalid GhJSON: ${document.error.message}`);
      }
      if (document.data.components.length === 0) {
        return toolFailure("GhJSON contains no components.");
      }

      const result = await host.putDocument(document.data, { editMode: parsed.data.editMode ?? false }, runtime.signal);
      return {
        success: true,
        components: result.placed,
        message: `Placed ${result.placed.length} component(s) on the canvas.`,
        ...(result.messages?.length ? { messages: result.messages } : {}),
      };
    },
  };
}

export function createGhTidyUpTool(host: CanvasHost): AITool {
  return {
    name: "gh_tidy_up",
    description: "Organize selected components into a tidy grid layout. Call `gh_get` first to get the list of GUIDs.",
    category: "Components",
    parameters: {
      type: "object",
      properties: {
        guids: filterDescription("List of component GUIDs to include in the tidy-up."),
        startPoint: {
          type: "object",
          properties: {
            x: { type: "number" },
            y: { type: "number" },
          },
          description: "Optional absolute start point for the top-left of the grid.",
        },
      },
      required: ["guids"],
    },
    async execute(args: JsonObject, runtime: ToolRuntime): Promise<JsonObject> {
      const parsed = ghTidyUpArgsSchema.safeParse(args);
      if (!parsed.success) {
        return toolFailure(`Invalid arguments: ${parsed.error.message}`);
      }
      const guids = parsed.data.guids ?? [];
      if (guids.length === 0) {
        return toolFailure("No GUIDs provided for tidy-up.");
      }

      const moved = await host.tidyUp(guids, parsed.data.startPoint ?? undefined, runtime.signal);
      return { success: true, moved };
    },
  };
}

export class CanvasTools implements AIToolProvider {
  constructor(private readonly _host: CanvasHost) {}

  getTools(): AITool[] {
    return [createGhGetTool(this._host), createGhPutTool(this._host), createGhTidyUpTool(this._host)];
  }
}
