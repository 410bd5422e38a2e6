import { AuthExpiredError, ValidationError } from "@docrelay/errors";
import type { DestinationConfig } from "@docrelay/types";
import type { DestinationCredential } from "./adapter.interface.js";

export function requireOption(destination: DestinationConfig, name: string): string {
  const value = destination.options[name]?.trim();
  if (!value) {
    throw new ValidationError(`Destination ${destination.name} is missing option "${name}"`, {
      [name]: "required",
    });
  }
  return value;
}

export function optionalOption(destination: DestinationConfig, name: string): string | null {
  const value = destination.options[name]?.trim();
  return value ? value : null;
}

export function booleanOption(destination: DestinationConfig, name: string, fallback: boolean): boolean {
  const value = optionalOption(destination, name);
  return value === null ? fallback : ["1", "true", "yes", "on"].includes(value.toLowerCase());
}

export function numberOption(destination: DestinationConfig, name: string, fallback: number): number {
  const value = optionalOption(destination, name);
  if (value === null) {
    return fallback;
  }
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new ValidationError(`Destination ${destination.name} option "${name}" must be a positive integer`, {
      [name]: "invalid",
    });
  }
  return parsed;
}

/** A missing secret parks the delivery in needs_reauth until an operator supplies it. */
export function requireSecret(
  destination: DestinationConfig,
  credential: DestinationCredential,
  field: string,
): string {
  const value = credential.secrets[field];
  if (!value) {
    throw new AuthExpiredError(
      `Destination ${destination.name} has no "${field}" configured`,
      { details: { destinationId: destination.id, field } },
    );
  }
  return value;
}

export function requireAccessToken(
  destination: DestinationConfig,
  credential: DestinationCredential,
): string {
  if (!credential.accessToken) {
    throw new AuthExpiredError(`Destination ${destination.name} is not authorized`, {
      details: { destinationId: destination.id },
    });
  }
  return credential.accessToken;
}

/** Join path parts with single slashes, dropping empty parts and edge slashes. */
export function joinRemotePath(...parts: (string | null)[]): string {
  return parts
    .filter((part): part is string => part !== null && part !== "")
    .map((part) => part.replace(/^\/+|\/+$/g, ""))
    .filter((part) => part !== "")
    .join("/");
}
