import { InvalidFieldError } from '../errors';

const ALPHANUMERIC = '[A-Za-z0-9]+';
const LOCAL_PART = `^${ALPHANUMERIC}(?:[+_.\\-]${ALPHANUMERIC})*`;
const DOMAIN_LABEL = `${ALPHANUMERIC}(?:-${ALPHANUMERIC})*`;
// last label is at least two characters long
const DOMAIN_LAST_LABEL = `(?=[A-Za-z0-9-]{2,}$)${DOMAIN_LABEL}$`;
const DOMAIN = `(?:${DOMAIN_LABEL}\\.)*${DOMAIN_LAST_LABEL}`;

/**
 * Email Value Object
 */
export class Email {
  static readonly MESSAGE_CONSTRAINTS =
    'Emails should be of the format local-part@domain and adhere to the following constraints:\n' +
    '1. The local-part should only contain alphanumeric characters and these special characters, excluding ' +
    'the parentheses, (+_.-). The local-part may not start or end with any special characters.\n' +
    '2. This is followed by a \'@\' and then a domain name. The domain name is made up of domain labels ' +
    'separated by periods.\n' +
    'The domain name must:\n' +
    '    - end with a domain label at least 2 characters long\n' +
    '    - have each domain label start and end with alphanumeric characters\n' +
    '    - have each domain label consist of alphanumeric characters, separated only by hyphens, if any.';

  private static readonly VALIDATION_REGEX = new RegExp(`${LOCAL_PART}@${DOMAIN}`);

  private constructor(readonly value: string) {
    Object.freeze(this);
  }

  static create(email: string): Email {
    const trimmed = email.trim();
    if (!Email.isValid(trimmed)) {
      throw new InvalidFieldError(Email.MESSAGE_CONSTRAINTS);
    }
    return new Email(trimmed);
  }

  static isValid(test: string): boolean {
    return Email.VALIDATION_REGEX.test(test);
  }

  equals(other: Email): boolean {
    return this.value === other.value;
  }

  toString(): string {
    return this.value;
  }
}
