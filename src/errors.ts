/** Invalid run or sweep parameters. Raised before anything is scheduled. */
export class ConfigurationError extends Error {
    readonly fields: string[];

    constructor(message: string, fields: string[] = []) {
        super(message);
        this.name = "ConfigurationError";
        this.fields = fields;
    }
}

/** Internal contract breach. Never recoverable. */
export class InvariantViolation extends Error {
    constructor(message: string) {
        super(message);
        this.name = "InvariantViolation";
    }
}
