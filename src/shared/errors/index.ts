export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigError';
    }
}

export class MalformedCandleError extends Error {
    constructor(
        message: string,
        public readonly field: string
    ) {
        super(message);
        this.name = 'MalformedCandleError';
    }
}

export class BrokerError extends Error {
    constructor(message: string, cause?: unknown) {
        super(message, { cause });
        this.name = 'BrokerError';
    }
}
