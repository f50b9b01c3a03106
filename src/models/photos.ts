import { z } from "zod";
import { readFileSync } from "fs";
import { ContainerFormatError } from "../errors.js";

export const photoAlbumSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  description: z.string().optional(),
});

export const photoModelSchema = z.object({
  title: z.string(),
  fetchableUrl: z.string().min(1),
  description: z.string().optional(),
  mediaType: z.string().optional(),
  dataId: z.string().optional(),
  albumId: z.string().optional(),
  // When set, fetchableUrl is a job store blob key rather than a URL
  inTempStore: z.boolean().default(false),
});

export const photosContainerSchema = z.object({
  albums: z.array(photoAlbumSchema).optional(),
  photos: z.array(photoModelSchema).optional(),
});

export type PhotoAlbum = z.infer<typeof photoAlbumSchema>;
export type PhotoModel = z.infer<typeof photoModelSchema>;
export type PhotosContainerResource = z.infer<typeof photosContainerSchema>;

export function parseContainer(raw: unknown): PhotosContainerResource {
  const result = photosContainerSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`
    );
    throw new ContainerFormatError("Invalid photos container", issues);
  }
  return result.data;
}

export function loadContainer(path: string): PhotosContainerResource {
  const content = readFileSync(path, "utf-8");
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ContainerFormatError(`${path} is not valid JSON (${message})`);
  }
  return parseContainer(raw);
}
