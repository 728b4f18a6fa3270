import { z } from 'zod';

// Response shapes of the external API. Every field is optional: the CLIs
// only look keys up and print whatever else comes back.

export const AuthUrlResponseSchema = z
  .object({
    auth_url: z.string().optional(),
    poll_token: z.string().optional()
  })
  .passthrough();

export type AuthUrlResponse = z.infer<typeof AuthUrlResponseSchema>;

export const PollResponseSchema = z
  .object({
    status: z.string().optional(),
    jwt: z.string().nullable().optional()
  })
  .passthrough();

export type PollResponse = z.infer<typeof PollResponseSchema>;

export const ProjectSchema = z
  .object({
    id: z.union([z.string(), z.number()]),
    name: z.string().optional()
  })
  .passthrough();

export const ProjectsListResponseSchema = z
  .object({
    projects: z.array(z.unknown()).optional()
  })
  .passthrough();

export type ProjectsListResponse = z.infer<typeof ProjectsListResponseSchema>;

export const PresignedUrlResponseSchema = z
  .object({
    download_url: z.string().optional()
  })
  .passthrough();

export type PresignedUrlResponse = z.infer<typeof PresignedUrlResponseSchema>;

/**
 * A task as listed by the server: task columns flattened next to the
 * resolved download URL
 */
export const TaskSchema = z
  .object({
    name: z.string().optional(),
    resource_url: z.string().nullable().optional(),
    resolved_resource_url: z.string().nullable().optional()
  })
  .passthrough();

export type Task = z.infer<typeof TaskSchema>;

export const TasksListResponseSchema = z
  .object({
    tasks: z.array(z.unknown()).optional()
  })
  .passthrough();

export type TasksListResponse = z.infer<typeof TasksListResponseSchema>;

export interface AccessibilityResult {
  /** HTTP status, 0 when the request itself failed */
  statusCode: number;
  error?: string;
}
