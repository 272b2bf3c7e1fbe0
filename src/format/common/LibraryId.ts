import { KiCadParseError } from "../../convert/errors";
import { type Sexpr, string } from "../../sexpr/Sexpr";

/**
 * Key naming a reusable definition, written `library:name`.
 * Symbols stored inside their own library file may omit the library part.
 */
export interface LibraryId {
  library?: string;
  name: string;
}

function malformed(input: string, reason: string): KiCadParseError {
  return new KiCadParseError({ type: "LibraryIdentifierMalformed", input, reason });
}

/**
 * Split at the first colon. The item name may itself contain colons, so
 * `formatLibraryId(parseLibraryId(s)) === s` for every accepted `s`.
 */
export function parseLibraryId(input: string): LibraryId {
  if (input.length === 0) {
    throw malformed(input, "identifier is empty");
  }

  const colon = input.indexOf(":");
  if (colon === -1) {
    return { name: input };
  }

  const library = input.slice(0, colon);
  const name = input.slice(colon + 1);
  if (library.length === 0) {
    throw malformed(input, "library nickname is empty");
  }
  if (name.length === 0) {
    throw malformed(input, "item name is empty");
  }
  return { library, name };
}

export function formatLibraryId(id: LibraryId): string {
  return id.library !== undefined ? `${id.library}:${id.name}` : id.name;
}

export function libraryIdToSexpr(id: LibraryId): Sexpr {
  return string(formatLibraryId(id));
}
