import type {
  BlendshelfSettings,
  UpdateBranchGroup,
} from "../configs/settings/types.js";
import type { UpdateBehavior } from "./resolver.js";

export interface BranchPolicy {
  behavior: UpdateBehavior;
  /** Whether updates are offered for the branch at all. */
  visible: boolean;
}

export interface UpdatePolicyConfig {
  readonly advanced: boolean;
  readonly global: BranchPolicy;
  readonly branches: Readonly<Record<UpdateBranchGroup, BranchPolicy>>;
}

export function buildUpdatePolicyConfig(
  settings: Pick<BlendshelfSettings, "updates">,
): UpdatePolicyConfig {
  const { updates } = settings;
  const toPolicy = (group: UpdateBranchGroup): BranchPolicy => ({
    behavior: updates.branches[group].behavior,
    visible: updates.branches[group].showButton,
  });

  return Object.freeze({
    advanced: updates.advanced,
    global: { behavior: updates.behavior, visible: updates.showButton },
    branches: Object.freeze({
      stable: toPolicy("stable"),
      daily: toPolicy("daily"),
      experimental: toPolicy("experimental"),
      bforartists: toPolicy("bforartists"),
      upbgeStable: toPolicy("upbgeStable"),
      upbgeWeekly: toPolicy("upbgeWeekly"),
    }),
  });
}

const EXPERIMENTAL_PREFIXES = ["Pr", "Npr", "PR", "NPR"];

/** The settings group a branch takes its update policy from. */
export function branchGroupOf(branch: string): UpdateBranchGroup | undefined {
  switch (branch) {
    case "stable":
    case "lts":
      return "stable";
    case "daily":
      return "daily";
    case "experimental":
    case "patch":
      return "experimental";
    case "bforartists":
      return "bforartists";
    case "upbge-stable":
      return "upbgeStable";
    case "upbge-weekly":
      return "upbgeWeekly";
    default:
      return EXPERIMENTAL_PREFIXES.some((prefix) => branch.startsWith(prefix))
        ? "experimental"
        : undefined;
  }
}

/**
 * Policy for `branch`; global values when advanced mode is off. Branches
 * outside every group have no policy and never get updates.
 */
export function resolveBranchPolicy(
  config: UpdatePolicyConfig,
  branch: string,
): BranchPolicy | undefined {
  const group = branchGroupOf(branch);
  if (group === undefined) {
    return undefined;
  }
  return config.advanced ? config.branches[group] : config.global;
}
