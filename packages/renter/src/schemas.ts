/**
 * Renter API response schemas
 */

import { z } from 'zod';

export const renterFileSchema = z.object({
  siapath: z.string(),
  filesize: z.number().nonnegative(),
});

export const renterFilesSchema = z.object({
  files: z.array(renterFileSchema).nullish().transform(files => files ?? []),
});

export const renterDirectorySchema = z.object({
  siapath: z.string(),
  aggregateminredundancy: z.number(),
});

export const renterDirSchema = z.object({
  directories: z.array(renterDirectorySchema).nullish().transform(dirs => dirs ?? []),
});

export const daemonVersionSchema = z.object({
  version: z.string(),
});

export const apiErrorSchema = z.object({
  message: z.string(),
});

export type RenterFile = z.infer<typeof renterFileSchema>;
export type RenterDirectory = z.infer<typeof renterDirectorySchema>;
