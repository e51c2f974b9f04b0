import { z } from 'zod';

/**
 * Body of POST /api/ansible/ping.
 * Entries stay unknown here: the host validator filters them one by one
 * so a single bad entry never rejects the whole request.
 */
export const PingRequestSchema = z.object({
    hosts: z.array(z.unknown()).max(256).optional()
}).strict();

export type PingRequest = z.infer<typeof PingRequestSchema>;

/**
 * url-encoded body of POST /login.
 */
export const LoginFormSchema = z.object({
    username: z.string().max(128),
    password: z.string().max(128)
});

export type LoginForm = z.infer<typeof LoginFormSchema>;
