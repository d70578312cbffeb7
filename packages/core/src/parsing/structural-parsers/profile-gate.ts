import { PROFILE_FIRST_NAME_PROP, PROFILE_LAST_NAME_PROP, PROFILE_OBJECT_TYPE, TYPE_PROP } from '../property-names.js';
import type { ReadonlyPropertyTable } from '../property-table.js';
import type { ConsumeOutcome, StructuralParser } from './types.js';

/**
 * Honours `profile:*` properties only when `og:type` is `profile`.
 *
 * The type is checked once, on the first profile declaration, and that decision holds for the
 * rest of the document even if `og:type` is declared or changed afterwards.
 */
export class ProfileGate implements StructuralParser {
  private checkedType = false;
  private isProfileType = false;

  consume(_property: string, _content: string, table: ReadonlyPropertyTable): ConsumeOutcome {
    if (!this.checkedType) {
      const type = table.get(TYPE_PROP);
      this.isProfileType = type !== undefined && type.toLowerCase() === PROFILE_OBJECT_TYPE;
      this.checkedType = true;
    }

    return this.isProfileType ? 'store' : 'discard';
  }

  /**
   * First and last name joined by a single space. Empty string when the profile carries
   * neither name; `undefined` when the document is not a profile.
   */
  getFullName(table: ReadonlyPropertyTable): string | undefined {
    if (!this.isProfileType) {
      return undefined;
    }

    const firstName = table.get(PROFILE_FIRST_NAME_PROP) ?? '';
    const lastName = table.get(PROFILE_LAST_NAME_PROP) ?? '';
    if (firstName && lastName) {
      return `${firstName} ${lastName}`;
    }
    return firstName + lastName;
  }
}
