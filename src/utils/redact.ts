import {
  isConfigObject,
  type ConfigObject,
  type ConfigValue,
  type Mutation
} from "@incus-converge/reconcile";

const SENSITIVE_KEY = /(password|secret|token)/i;
const REDACTED = "<redacted>";

export function redactDocument(document: ConfigObject): ConfigObject {
  const result: ConfigObject = {};
  for (const [key, value] of Object.entries(document)) {
    result[key] = SENSITIVE_KEY.test(key) && typeof value === "string" ? REDACTED : redactValue(value);
  }
  return result;
}

function redactValue(value: ConfigValue): ConfigValue {
  if (isConfigObject(value)) {
    return redactDocument(value);
  }
  if (Array.isArray(value)) {
    return value.map(redactValue);
  }
  return value;
}

/** Mutation as it may be shown: string values under a sensitive key are hidden. */
export function redactMutation(mutation: Mutation): Mutation {
  if (mutation.value === undefined) {
    return mutation;
  }
  const sensitive = mutation.path.some((segment) => SENSITIVE_KEY.test(segment));
  const value =
    sensitive && typeof mutation.value === "string" ? REDACTED : redactValue(mutation.value);
  return { ...mutation, value };
}

/**
 * Command line as it may be shown: `key=value` pairs and the value following
 * a bare dotted key (`config set c1 core.trust_password <value>`) are hidden
 * when the key is sensitive.
 */
export function redactArgs(args: readonly string[]): string[] {
  return args.map((arg, index) => {
    const equals = arg.indexOf("=");
    if (equals > 0 && SENSITIVE_KEY.test(arg.slice(0, equals))) {
      return `${arg.slice(0, equals + 1)}${REDACTED}`;
    }
    const previous = index > 0 ? args[index - 1] : undefined;
    if (
      previous !== undefined &&
      !previous.startsWith("-") &&
      !previous.includes("=") &&
      previous.includes(".") &&
      SENSITIVE_KEY.test(previous)
    ) {
      return REDACTED;
    }
    return arg;
  });
}
