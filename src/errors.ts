export class StringsPoError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** A resource XML file could not be parsed. */
export class InvalidResourceError extends StringsPoError {}

/** A .po/.pot file could not be parsed. */
export class InvalidCatalogError extends StringsPoError {}

/** A malformed escape sequence inside an Android string. */
export class InvalidEscapeError extends StringsPoError {}

/** Problems with the configuration or the project layout. */
export class CommandError extends StringsPoError {}

/** A config file that cannot be read or does not match the expected shape. */
export class ConfigError extends StringsPoError {}

/** A `<plurals>` element lacks a quantity its language requires. */
export class IncompletePluralError extends StringsPoError {
  constructor(
    public readonly resourceName: string,
    public readonly language: string,
    public readonly missing: string[]
  ) {
    super(
      `Plural "${resourceName}" is missing quantity ${missing.map((keyword) => `"${keyword}"`).join(', ')} ` +
        `required by language "${language}"`
    );
  }
}
