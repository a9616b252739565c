import { z } from "zod";
import { LogLevel } from "../types/log-level.js";
import { OutputTarget } from "../types/output-target.js";

export const sinkConfigSchema = z.object({
  level: z.nativeEnum(LogLevel).optional(),
  target: z.nativeEnum(OutputTarget).optional(),
  template: z.string().min(1).optional(),

  // File destination
  filePath: z.string().min(1).optional(),
  append: z.boolean().optional(),
  timestampSuffix: z.boolean().optional(),

  // Queue bound
  queueCapacity: z.number().int().min(1).optional(),
  overflow: z.enum(["drop-oldest", "drop-newest"]).optional(),
});
