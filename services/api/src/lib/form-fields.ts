import { z } from "zod";

// Repeated multipart fields arrive as arrays; the last value wins.
function lastValue(value: unknown): unknown {
  return Array.isArray(value) ? value[value.length - 1] : value;
}

function blankToUndefined(value: unknown): unknown {
  const single = lastValue(value);
  if (typeof single !== "string") {
    return single;
  }
  const trimmed = single.trim();
  return trimmed.length === 0 ? undefined : trimmed;
}

function toNumber(value: unknown): unknown {
  const candidate = blankToUndefined(value);
  if (typeof candidate !== "string") {
    return candidate;
  }
  const parsed = Number(candidate);
  return Number.isFinite(parsed) ? parsed : candidate;
}

function toBoolean(value: unknown): unknown {
  const candidate = blankToUndefined(value);
  if (typeof candidate !== "string") {
    return candidate;
  }
  const normalized = candidate.toLowerCase();
  if (["true", "1", "yes", "on"].includes(normalized)) {
    return true;
  }
  if (["false", "0", "no", "off"].includes(normalized)) {
    return false;
  }
  return candidate;
}

export function numberField(label: string): z.ZodNumber {
  return z.number({
    required_error: `${label} is required`,
    invalid_type_error: `${label} must be a number`
  });
}

export function integerField(label: string): z.ZodNumber {
  return numberField(label).int(`${label} must be an integer`);
}

/**
 * Wrap a number schema so it accepts the string a multipart form carries.
 */
export function formNumber<T extends z.ZodTypeAny>(schema: T): z.ZodEffects<T, z.output<T>, unknown> {
  return z.preprocess(toNumber, schema);
}

export function formBoolean(label: string, defaultValue: boolean) {
  return z.preprocess(
    toBoolean,
    z.boolean({ invalid_type_error: `${label} must be true or false` }).default(defaultValue)
  );
}

/**
 * Wrap a string schema so blank form values count as absent.
 */
export function formString<T extends z.ZodTypeAny>(schema: T): z.ZodEffects<T, z.output<T>, unknown> {
  return z.preprocess(blankToUndefined, schema);
}

/**
 * Parse a form field holding JSON text and validate the decoded value.
 *
 * @param label - Field name used in error messages
 * @param schema - Schema for the decoded value; wrap it in `.optional()` for optional fields
 */
export function formJson<T extends z.ZodTypeAny>(label: string, schema: T): z.ZodEffects<T, z.output<T>, unknown> {
  return z.preprocess((value, ctx) => {
    const candidate = blankToUndefined(value);
    if (typeof candidate !== "string") {
      return candidate;
    }
    try {
      return JSON.parse(candidate) as unknown;
    } catch {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${label} must be valid JSON` });
      return z.NEVER;
    }
  }, schema);
}

/**
 * Render the first issue of a failed parse as a single caller-facing sentence.
 */
export function describeFirstIssue(error: z.ZodError): string {
  const issue = error.issues[0];
  if (!issue) {
    return "Invalid request parameters";
  }

  const field = issue.path.map(String).join(".");
  if (!field || issue.message.startsWith(String(issue.path[0]))) {
    return issue.message;
  }
  return `${field}: ${issue.message}`;
}
