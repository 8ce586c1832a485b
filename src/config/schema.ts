// pattern: Functional Core
import { z } from "zod";

const ModelConfigSchema = z
  .object({
    provider: z.enum(["azure-openai", "openai-compat"]).default("azure-openai"),
    name: z.string().min(1),
    api_key: z.string().min(1).optional(),
    endpoint: z.string().url().optional(),
    api_version: z.string().min(1).optional(),
    max_tokens: z.number().int().positive().default(4096),
    temperature: z.number().min(0).max(2).optional(),
    max_retries: z.number().int().nonnegative().default(0),
  })
  .superRefine((data, ctx) => {
    if (!data.api_key) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "api_key is required", path: ["api_key"] });
    }
    if (data.provider === "azure-openai") {
      if (!data.endpoint) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: "endpoint is required for azure-openai", path: ["endpoint"] });
      }
      if (!data.api_version) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: "api_version is required for azure-openai", path: ["api_version"] });
      }
    }
  });

const SearchConnectionSchema = z.enum(["brave", "tavily", "duckduckgo"]);

const GroundingConfigSchema = z
  .object({
    backend: z.enum(["assistants", "model"]).default("model"),
    project_endpoint: z.string().url().optional(),
    model: z.string().min(1).default("gpt-4o"),
    connection: SearchConnectionSchema.default("duckduckgo"),
    brave_api_key: z.string().min(1).optional(),
    tavily_api_key: z.string().min(1).optional(),
    max_results: z.number().int().positive().max(20).default(5),
  })
  .superRefine((data, ctx) => {
    if (data.backend === "assistants" && !data.project_endpoint) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "project_endpoint is required for the assistants backend", path: ["project_endpoint"] });
    }
    if (data.connection === "brave" && !data.brave_api_key) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "brave_api_key is required when connection is brave", path: ["brave_api_key"] });
    }
    if (data.connection === "tavily" && !data.tavily_api_key) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "tavily_api_key is required when connection is tavily", path: ["tavily_api_key"] });
    }
  });

const AnalysisConfigSchema = z.object({
  subject: z.string().min(1).default("ICICIBANK.NS"),
  interval_seconds: z.number().int().positive().default(60),
  stop_phrase: z.string().min(1).default("Decision Made"),
  max_messages: z.number().int().positive().default(15),
  max_tool_rounds: z.number().int().positive().default(10),
});

const AppConfigSchema = z.object({
  model: ModelConfigSchema,
  grounding: GroundingConfigSchema.default({}),
  analysis: AnalysisConfigSchema.default({}),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;
export type ModelConfig = z.infer<typeof ModelConfigSchema>;
export type GroundingConfig = z.infer<typeof GroundingConfigSchema>;
export type AnalysisConfig = z.infer<typeof AnalysisConfigSchema>;
export type SearchConnection = z.infer<typeof SearchConnectionSchema>;

export { AppConfigSchema, ModelConfigSchema, GroundingConfigSchema, AnalysisConfigSchema, SearchConnectionSchema };
