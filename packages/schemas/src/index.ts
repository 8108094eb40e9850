export * from "./types";
export { default as hooksSchema } from "../schemas/hooks.schema.json";
export { default as nichesSchema } from "../schemas/niches.schema.json";
export { default as lengthsSchema } from "../schemas/lengths.schema.json";
export { default as assemblySchema } from "../schemas/assembly.schema.json";
export { default as trendsConfigSchema } from "../schemas/trends_config.schema.json";
export { default as trendFeedSchema } from "../schemas/trend_feed.schema.json";
export { default as scriptRequestSchema } from "../schemas/script_request.schema.json";
export { default as analyzeRequestSchema } from "../schemas/analyze_request.schema.json";
