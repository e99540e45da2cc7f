import { z } from "zod";

import { UPDATE_BEHAVIORS, type UpdateBehavior } from "../../updates/resolver.js";
import { tryParseBuildVersion } from "../../versions/parser.js";

export const UPDATE_BRANCH_GROUPS = [
  "stable",
  "daily",
  "experimental",
  "bforartists",
  "upbgeStable",
  "upbgeWeekly",
] as const;

export type UpdateBranchGroup = (typeof UPDATE_BRANCH_GROUPS)[number];

export const updateBehaviorSchema = z.enum(UPDATE_BEHAVIORS);

const versionTextSchema = z.string({
  invalid_type_error: 'expected quoted version text such as "3.0"',
});

const branchUpdateSettingsSchema = z
  .object({
    behavior: updateBehaviorSchema.optional(),
    showButton: z.boolean().optional(),
  })
  .strict();

export const settingsSchema = z
  .object({
    updates: z
      .object({
        advanced: z.boolean().optional(),
        behavior: updateBehaviorSchema.optional(),
        showButton: z.boolean().optional(),
        branches: z
          .object({
            stable: branchUpdateSettingsSchema.optional(),
            daily: branchUpdateSettingsSchema.optional(),
            experimental: branchUpdateSettingsSchema.optional(),
            bforartists: branchUpdateSettingsSchema.optional(),
            upbgeStable: branchUpdateSettingsSchema.optional(),
            upbgeWeekly: branchUpdateSettingsSchema.optional(),
          })
          .strict()
          .optional(),
      })
      .strict()
      .optional(),
    scraping: z
      .object({
        minimumStableVersion: versionTextSchema
          .refine(
            (value) =>
              value.trim() === "None" ||
              tryParseBuildVersion(value.trim()) !== undefined,
            { message: 'expected a version such as "3.0", or "None"' },
          )
          .optional(),
        ltsVersions: z.array(versionTextSchema).optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

export type SettingsDocument = z.infer<typeof settingsSchema>;

export interface BranchUpdateSettings {
  behavior: UpdateBehavior;
  showButton: boolean;
}

export interface BlendshelfSettings {
  updates: {
    /** Per-branch values apply only when set. */
    advanced: boolean;
    behavior: UpdateBehavior;
    showButton: boolean;
    branches: Record<UpdateBranchGroup, BranchUpdateSettings>;
  };
  scraping: {
    /** `major.minor`, or "None" for no minimum. */
    minimumStableVersion: string;
    ltsVersions: string[];
  };
}
