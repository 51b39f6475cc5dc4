/**
 * Names of the formats the library can check
 */
export type FormatName =
  | 'ascii'
  | 'base64'
  | 'cep'
  | 'cnpj'
  | 'cpf'
  | 'date'
  | 'decimal'
  | 'email'
  | 'mac-address'
  | 'md5'
  | 'number'
  | 'port'
  | 'postal-code'
  | 'time'

/**
 * Predicate signature shared by every string validator.
 * Throws for degenerate input where the validator documents it.
 */
export type FormatPredicate = (value: string) => boolean

/**
 * Registry entry for a format. Entries are frozen.
 */
export interface FormatDefinition {
  /** Registered name */
  readonly name: FormatName

  /** Human-readable label used in messages, e.g. 'MAC address' */
  readonly label: string

  /** What the format accepts */
  readonly description: string

  /** The validator */
  readonly predicate: FormatPredicate

  /** A value the validator accepts, used in suggestions and health checks */
  readonly example: string

  /** A non-empty value the validator rejects, used in health checks */
  readonly counterExample: string
}
