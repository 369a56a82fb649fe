import { z } from "zod";
import { DEVICE_CATEGORIES, type TypedDeviceCategory } from "../core/device-category.js";
import type { AppInfo } from "./app-info.js";

const typedCategories = DEVICE_CATEGORIES.filter(
  (category): category is TypedDeviceCategory => category !== "generic",
);

const typedCategorySchema = z.custom<TypedDeviceCategory>(
  (value) => typeof value === "string" && (typedCategories as readonly string[]).includes(value),
  { message: `must be one of ${typedCategories.join(", ")}` },
);

export const appInfoSchema = z.object({
  title: z.string().min(1).max(256),
  description: z.string().max(1024),
  author: z.object({
    name: z.string().min(1),
    contact: z.string(),
  }),
  supportedDevices: z.array(typedCategorySchema).min(1),
  category: z.enum(["application", "game"]),
}) satisfies z.ZodType<AppInfo>;

/** Wire shape of the handshake body, using the control plane's field names. */
export function toWireAppInfo(info: AppInfo): Record<string, unknown> {
  return {
    title: info.title,
    description: info.description,
    author: { name: info.author.name, contact: info.author.contact },
    device_supported: [...new Set(info.supportedDevices)].map((category) =>
      category === "link" ? "chromalink" : category,
    ),
    category: info.category,
  };
}
