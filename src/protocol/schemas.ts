/**
 * Wire schemas shared by every command: messages, positions, tasks and notes.
 */
import { z } from 'zod';

/** Schema accepted by the payload decoder; input is whatever JSON.parse produced */
export type PayloadSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

/** Source position within prover text */
export const PositionSchema = z.object({
  line: z.number().int().optional(),
  offset: z.number().int().optional(),
  end_offset: z.number().int().optional(),
  file: z.string().optional(),
  id: z.number().int().optional(),
});
export type Position = z.infer<typeof PositionSchema>;

/** Message with kind `writeln`, `warning`, `error`, ... */
export const MessageSchema = z.object({
  kind: z.string(),
  message: z.string(),
  pos: PositionSchema.optional(),
});
export type Message = z.infer<typeof MessageSchema>;

/** Identifier of an in-flight asynchronous operation */
export const TaskSchema = z.object({
  task: z.string(),
});
export type Task = z.infer<typeof TaskSchema>;

/**
 * Progress notification. Every field is optional; unknown fields such as
 * `nodes_status` are kept as received.
 */
export const NoteSchema = z
  .object({
    task: z.string().optional(),
    kind: z.string().optional(),
    message: z.string().optional(),
    session: z.string().optional(),
    percentage: z.number().optional(),
  })
  .passthrough();
export type Note = z.infer<typeof NoteSchema>;

/**
 * Error payload of synchronous commands. The server answers with a message
 * object for most failures and a bare JSON string for malformed input.
 */
export const CommandErrorSchema = z.union([MessageSchema, z.string()]);
export type CommandError = z.infer<typeof CommandErrorSchema>;

/** Empty payload (`OK` with nothing after it) */
export const UnitSchema = z.null();
export type Unit = z.infer<typeof UnitSchema>;

/** Accepts any JSON value unchanged */
export const AnySchema: PayloadSchema<unknown> = z.unknown();

/** Schema for commands whose failure carries no context */
export const NoContextSchema: PayloadSchema<never> = z.never();
