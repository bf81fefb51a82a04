/**
 * xbe CLI - CLI Types
 *
 * Types shared by the command handlers.
 */

// ===== I/O =====

export interface OutputStream {
  write(chunk: string): unknown;
}

export interface CliIO {
  stdout: OutputStream;
  stderr: OutputStream;
  env: NodeJS.ProcessEnv;
  color: boolean;                      // Default color decision before --no-color
  fetchImplementation?: typeof fetch;
  signal?: AbortSignal;                // Interrupt signal for the in-flight request
}

// ===== Flags =====

export interface ConnectionFlags {
  baseUrl?: string;                    // --base-url
  token?: string;                      // --token
  json?: boolean;                      // --json
}

export interface ReadFlags extends ConnectionFlags {
  auth: boolean;                       // false when --no-auth is given
  omitNull?: boolean;                  // --omit-null
}

export interface ListFlags extends ReadFlags {
  limit?: number;                      // --limit
  offset?: number;                     // --offset
  sort?: string;                       // --sort
  fields?: string;                     // --fields (sparse fieldset for the primary type)
}

export interface DeleteFlags extends ConnectionFlags {
  confirm?: boolean;                   // --confirm
}

export interface GlobalFlags {
  verbose?: boolean;
  color: boolean;                      // false when --no-color is given
  config?: string;
}

export type OptionValues = Record<string, unknown>;
