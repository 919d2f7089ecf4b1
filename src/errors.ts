/**
 * Raised when a value cannot be used as a set source or as a set element.
 */
export class InvalidInputError extends TypeError {
    constructor(message: string) {
        super(`InvalidInput: ${message}`);
        this.name = 'InvalidInputError';
    }
}

/**
 * Raised by the disabled variants of indexed access (`in` and `delete`).
 */
export class NotSupportedError extends Error {
    readonly operation: string;

    constructor(operation: string) {
        super(`NotSupported: indexed '${operation}' is not supported on a ScalarSet view`);
        this.name = 'NotSupportedError';
        this.operation = operation;
    }
}
