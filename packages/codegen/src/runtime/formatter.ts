import { DateTime } from 'luxon';
import { RuntimeParseError } from '../errors';

const DATE_TOKENS = /[yMd]/;

/**
 * Formats and parses dates with a fixed pattern in a configurable time zone.
 *
 * Patterns use luxon's format tokens. A pattern without date tokens parses to a time on
 * 1970-01-01 in the formatter's zone.
 */
export class DateTimeFormatter {
    private zone = 'UTC';

    constructor(readonly pattern: string) {}

    setTimeZone(zone: string) {
        this.zone = zone;
    }

    getTimeZone() {
        return this.zone;
    }

    format(date: Date): string {
        return DateTime.fromJSDate(date, { zone: this.zone }).toFormat(this.pattern);
    }

    /**
     * Parses the longest prefix of `text` that matches the pattern; any remaining characters
     * are ignored.
     */
    parse(text: string): Date {
        for (let end = text.length; end > 0; end--) {
            const parsed = this.parseExactly(text.slice(0, end));
            if (parsed.isValid) {
                return parsed.toJSDate();
            }
        }
        throw new RuntimeParseError(text, `date for pattern "${this.pattern}"`);
    }

    private parseExactly(text: string) {
        return DATE_TOKENS.test(this.pattern)
            ? DateTime.fromFormat(text, this.pattern, { zone: this.zone })
            : DateTime.fromFormat(`1970-01-01 ${text}`, `yyyy-MM-dd ${this.pattern}`, { zone: this.zone });
    }
}

export function createFormatter(pattern: string) {
    return new DateTimeFormatter(pattern);
}
