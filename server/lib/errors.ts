export type NotInvertibleReason = "non-square" | "singular";

export class NotInvertibleError extends Error {
    constructor(public readonly reason: NotInvertibleReason, message: string, options?: ErrorOptions) {
        super(message, options);
        this.name = "NotInvertibleError";
    }
}
