import type { BuildRecord } from "../builds/types.js";
import { resolveBranchPolicy, type UpdatePolicyConfig } from "./policy.js";
import { findUpdate } from "./resolver.js";

/**
 * The update to offer for `installed` under the configured policy, or
 * undefined when the build is frozen or its branch gets no updates.
 */
export function resolveAvailableUpdate(
  installed: BuildRecord,
  candidates: readonly BuildRecord[],
  config: UpdatePolicyConfig,
  library: readonly BuildRecord[] = [installed],
): BuildRecord | undefined {
  if (installed.isFrozen) {
    return undefined;
  }

  const policy = resolveBranchPolicy(config, installed.branch);
  if (!policy?.visible) {
    return undefined;
  }

  return findUpdate(installed, candidates, policy.behavior, { library });
}
