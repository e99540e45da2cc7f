import type { YAMLException } from "js-yaml";

export function isYamlException(error: unknown): error is YAMLException {
  return (
    typeof error === "object" &&
    error !== null &&
    "name" in error &&
    error.name === "YAMLException"
  );
}
