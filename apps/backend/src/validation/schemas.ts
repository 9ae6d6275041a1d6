import { z } from "zod";
import type { AnswerRequest, DoctorRecord } from "@healthdesk/shared";

// Request payload schemas for the HTTP surface.

const RequiredText = (field: string, max: number) =>
  z
    .string({ required_error: `${field} is required`, invalid_type_error: `${field} must be a string` })
    .trim()
    .min(1, `${field} is required`)
    .max(max, `${field} must be ${max} characters or less`);

export const AnswerRequestSchema = z.object({
  question: RequiredText("question", 4000)
}) satisfies z.ZodType<AnswerRequest>;

export const DoctorRecordSchema = z.object({
  name: RequiredText("name", 200),
  specialization: RequiredText("specialization", 200),
  availableTimings: RequiredText("availableTimings", 200),
  location: RequiredText("location", 200),
  contact: RequiredText("contact", 200)
}) satisfies z.ZodType<DoctorRecord>;

export function firstIssue(error: z.ZodError): string {
  return error.issues[0]?.message ?? "Invalid payload";
}
