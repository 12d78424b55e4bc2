/** Base class for failures while reading membership settings from the environment. */
export class MembershipConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MembershipConfigError';
  }
}

/** Profile name is not one of the known network profiles. */
export class InvalidProfileError extends MembershipConfigError {
  readonly variable: string;
  readonly value: string;

  constructor(variable: string, value: string, known: readonly string[]) {
    super(`${variable}="${value}" is not a known profile. Expected one of: ${known.join(', ')}.`);
    this.name = 'InvalidProfileError';
    this.variable = variable;
    this.value = value;
  }
}

/** Setting expected to hold an integer holds something else. */
export class InvalidIntegerSettingError extends MembershipConfigError {
  readonly variable: string;
  readonly value: string;

  constructor(variable: string, value: string) {
    super(`${variable}="${value}" is not an integer.`);
    this.name = 'InvalidIntegerSettingError';
    this.variable = variable;
    this.value = value;
  }
}
