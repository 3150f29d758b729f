export type FormatterKind = 'date' | 'time' | 'timestamp';

export const FORMATTER_PATTERNS: Readonly<Record<FormatterKind, string>> = {
    date: 'yyyy-MM-dd',
    time: 'HH:mm:ss',
    timestamp: 'yyyy-MM-dd HH:mm:ss.SSS',
};

export const FORMATTER_NAMES: Readonly<Record<FormatterKind, string>> = {
    date: 'dateFormatter',
    time: 'timeFormatter',
    timestamp: 'timestampFormatter',
};

/**
 * Member declarations and their one-time init statements shared by all expressions of a
 * session. Statements are deduplicated by their exact text and kept in insertion order.
 */
export class DeclarationRegistry {
    private readonly members = new Set<string>();
    private readonly inits = new Set<string>();

    constructor(private readonly timeZone: string) {}

    addMember(statement: string) {
        this.members.add(statement);
    }

    addInit(statement: string) {
        this.inits.add(statement);
    }

    getMembers(): string[] {
        return [...this.members];
    }

    getInits(): string[] {
        return [...this.inits];
    }

    memberCode(): string {
        return [...this.members].map((s) => s + '\n').join('');
    }

    initCode(): string {
        return [...this.inits].map((s) => s + '\n').join('');
    }

    /**
     * Registers the formatter of the given kind, once per session, and returns its identifier.
     */
    ensureFormatter(kind: FormatterKind): string {
        const name = FORMATTER_NAMES[kind];
        this.addMember(`const ${name} = runtime.createFormatter(${quote(FORMATTER_PATTERNS[kind])});`);
        this.addInit(`${name}.setTimeZone(${quote(this.timeZone)});`);
        return name;
    }

    /**
     * Registers a constant for a date literal and returns its identifier. One constant exists per
     * distinct epoch millisecond value.
     */
    ensureDateConstant(date: Date): string {
        const millis = date.getTime();
        const name = millis < 0 ? `date$m${-millis}` : `date$${millis}`;
        this.addMember(`const ${name} = new Date(${millis});`);
        return name;
    }
}

function quote(value: string) {
    return `'${value.replace(/\\/g, '\\\\').replace(/'/g, "\\'")}'`;
}
