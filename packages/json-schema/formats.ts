/**
 * Format registry
 *
 * Named patterns for the `format` keyword. Built on first use and never
 * modified afterwards; the compiled expressions carry no flags, so sharing
 * them between calls is safe.
 */

const OCTET = "(?:25[0-5]|2[0-4]\\d|1\\d\\d|[1-9]?\\d)";
const HEX = "[0-9a-fA-F]{1,4}";
const DATE = "\\d{4}-(?:0[1-9]|1[0-2])-(?:0[1-9]|[12]\\d|3[01])";
const TIME = "(?:[01]\\d|2[0-3]):[0-5]\\d:(?:[0-5]\\d|60)";
const LABEL = "[a-zA-Z0-9](?:[a-zA-Z0-9-]{0,61}[a-zA-Z0-9])?";

const FORMAT_SOURCES: Readonly<Record<string, string>> = Object.freeze({
  // RFC 3339: 2024-01-15T10:30:00Z, 2024-01-15T10:30:00.250+02:00
  "date-time": `^${DATE}[Tt]${TIME}(?:\\.\\d+)?(?:[Zz]|[+-](?:[01]\\d|2[0-3]):[0-5]\\d)$`,
  "date": `^${DATE}$`,
  "time": `^${TIME}(?:\\.\\d+)?$`,
  "email": "^[^\\s@]+@[^\\s@]+\\.[^\\s@]+$",
  "hostname": `^(?=.{1,253}$)${LABEL}(?:\\.${LABEL})*$`,
  "ipv4": `^(?:${OCTET}\\.){3}${OCTET}$`,
  "ipv6": "^(?:" + [
    `(?:${HEX}:){7}${HEX}`,
    `(?:${HEX}:){1,7}:`,
    `(?:${HEX}:){1,6}:${HEX}`,
    `(?:${HEX}:){1,5}(?::${HEX}){1,2}`,
    `(?:${HEX}:){1,4}(?::${HEX}){1,3}`,
    `(?:${HEX}:){1,3}(?::${HEX}){1,4}`,
    `(?:${HEX}:){1,2}(?::${HEX}){1,5}`,
    `${HEX}:(?::${HEX}){1,6}`,
    `:(?:(?::${HEX}){1,7}|:)`,
  ].join("|") + ")$",
  "uri": "^[a-zA-Z][a-zA-Z0-9+.-]*:[^\\s]+$",
  "uuid":
    "^[0-9a-fA-F]{8}-[0-9a-fA-F]{4}-[0-9a-fA-F]{4}-[0-9a-fA-F]{4}-[0-9a-fA-F]{12}$",
});

let registry: ReadonlyMap<string, RegExp> | undefined;

// Module-private: callers only see lookups and a copy of the names
function compiled(): ReadonlyMap<string, RegExp> {
  if (!registry) {
    registry = new Map(
      Object.entries(FORMAT_SOURCES).map((
        [name, source],
      ) => [name, new RegExp(source)]),
    );
  }
  return registry;
}

export function lookupFormat(name: string): RegExp | undefined {
  return compiled().get(name);
}

export function knownFormats(): string[] {
  return [...compiled().keys()];
}
