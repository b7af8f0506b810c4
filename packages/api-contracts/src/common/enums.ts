import { z } from 'zod';

export const ResourceFetchErrorKindSchema = z.enum(['not_found', 'internal', 'network', 'cancelled']);

export const ViewerStatusSchema = z.enum(['loading', 'displaying', 'error']);

export type ResourceFetchErrorKind = z.infer<typeof ResourceFetchErrorKindSchema>;
export type ViewerStatus = z.infer<typeof ViewerStatusSchema>;
