import { randomBytes } from "crypto";

/**
 * Generate a random alphanumeric password
 */
export function generatePassword(length: number = 24): string {
  const charset = "abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789";
  const bytes = randomBytes(length);
  return Array.from(bytes)
    .map((b) => charset[b % charset.length])
    .join("");
}

/**
 * Reduce a free-form name to a migration file slug
 */
export function sanitizeName(name: string): string {
  return name
    .trim()
    .toLowerCase()
    .replace(/[^a-z0-9_]+/g, "_")
    .replace(/^_+|_+$/g, "")
    .slice(0, 63);
}

/**
 * Validate a SQL identifier (database or user name)
 */
export function isValidIdentifier(name: string): { valid: boolean; error?: string } {
  if (!name || name.length === 0) {
    return { valid: false, error: "Name cannot be empty" };
  }

  if (name.length > 63) {
    return { valid: false, error: "Name cannot exceed 63 characters" };
  }

  if (!/^[a-z_][a-z0-9_]*$/.test(name)) {
    return {
      valid: false,
      error: "Name must start with a letter or underscore and contain only lowercase letters, numbers and underscores",
    };
  }

  const reserved = ["root", "admin", "public", "node", "none"];
  if (reserved.includes(name)) {
    return { valid: false, error: `"${name}" is a reserved name` };
  }

  return { valid: true };
}

/**
 * Quote a string as a SQL literal
 */
export function quoteLiteral(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}
