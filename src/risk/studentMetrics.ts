import { z } from "zod";

import { InvalidInputError } from "../errors";

const percentage = (label: string) =>
  z
    .number({ required_error: `${label} is required`, invalid_type_error: `${label} must be a number` })
    .finite()
    .min(0, `${label} must be between 0 and 100`)
    .max(100, `${label} must be between 0 and 100`);

export const studentMetricsSchema = z
  .object({
    studentId: z.string().min(1).max(100).optional(),
    name: z.string().min(1).max(200).optional(),
    attendance: percentage("attendance"),
    averageScore: percentage("averageScore"),
    assignmentsSubmitted: z.number().int().min(0, "assignmentsSubmitted must be >= 0"),
    totalAssignments: z.number().int().min(1, "totalAssignments must be >= 1"),
    engagementScore: percentage("engagementScore")
  })
  .strict()
  .refine((m) => m.assignmentsSubmitted <= m.totalAssignments, {
    message: "assignmentsSubmitted cannot exceed totalAssignments",
    path: ["assignmentsSubmitted"]
  });

export type StudentMetricsInput = z.input<typeof studentMetricsSchema>;

export type StudentMetrics = Readonly<z.output<typeof studentMetricsSchema>>;

export const createStudentMetrics = (input: unknown): StudentMetrics => {
  const parsed = studentMetricsSchema.safeParse(input);
  if (!parsed.success) {
    throw new InvalidInputError(
      "Invalid student metrics",
      parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
    );
  }
  return Object.freeze(parsed.data);
};

export const completionRate = (metrics: StudentMetrics): number =>
  (metrics.assignmentsSubmitted / metrics.totalAssignments) * 100;
