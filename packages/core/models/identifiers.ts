import { MAX_U32, parseU32 } from "../parser/base";

// ---------------------------------------------------------------------------------
// Branded Identifiers
// ---------------------------------------------------------------------------------

/**
 * Positive 32-bit identifier branded with the entity it belongs to.
 *
 * Still a plain `number` at runtime, so identifiers compare, order and hash
 * by value and work as `Map` keys; the brand keeps a locality id from being
 * passed where a neighborhood id is expected.
 */
export type Identifier<Entity extends string> = number & {
    readonly __entity: Entity;
};

export type LocalityId = Identifier<"locality">;
export type NeighborhoodId = Identifier<"neighborhood">;
export type StreetId = Identifier<"street">;
export type BigUserId = Identifier<"big user">;
export type OperationalUnitId = Identifier<"operational unit">;
export type CpcId = Identifier<"CPC">;

/** Streets are the address records of LOG_LOGRADOURO; both names refer to LOG_NU. */
export type AddressId = StreetId;

/**
 * Raised when an identifier cannot be constructed.
 */
export class IdentifierError extends Error {
    /** Why the value was rejected */
    readonly reason: "zero" | "invalid-format";
    /** Entity label, e.g. `locality` */
    readonly entity: string;

    constructor(
        entity: string,
        reason: "zero" | "invalid-format",
        value?: string,
    ) {
        super(
            reason === "zero"
                ? `${entity} ID cannot be zero`
                : `invalid ${entity} ID format: '${value ?? ""}'`,
        );
        this.name = "IdentifierError";
        this.entity = entity;
        this.reason = reason;
    }
}

/**
 * Constructors for one identifier family.
 */
export interface IdentifierFactory<Entity extends string> {
    /** Entity label used in error messages */
    readonly entity: Entity;
    /**
     * Wraps an unsigned integer.
     *
     * @throws {IdentifierError} When the value is zero or not an unsigned 32-bit integer.
     */
    fromNumber(value: number): Identifier<Entity>;
    /**
     * Parses trimmed decimal text.
     *
     * @throws {IdentifierError} When the text is not a number, or is zero.
     */
    parse(text: string): Identifier<Entity>;
}

/**
 * Builds the constructors of an identifier family.
 *
 * @param entity - Entity label, used in the brand and in error messages.
 * @returns The identifier factory.
 */
export const identifierFactory = <Entity extends string>(
    entity: Entity,
): IdentifierFactory<Entity> => {
    const isIdentifier = (value: number): value is Identifier<Entity> =>
        Number.isInteger(value) && value > 0 && value <= MAX_U32;

    const fromNumber = (value: number): Identifier<Entity> => {
        if (value === 0) throw new IdentifierError(entity, "zero");
        if (!isIdentifier(value)) {
            throw new IdentifierError(entity, "invalid-format", String(value));
        }
        return value;
    };

    return {
        entity,
        fromNumber,
        parse: (text: string) => {
            const value = parseU32(text);
            if (value === undefined) {
                throw new IdentifierError(entity, "invalid-format", text);
            }
            return fromNumber(value);
        },
    };
};

export const LocalityId = identifierFactory("locality");
export const NeighborhoodId = identifierFactory("neighborhood");
export const StreetId = identifierFactory("street");
export const AddressId = StreetId;
export const BigUserId = identifierFactory("big user");
export const OperationalUnitId = identifierFactory("operational unit");
export const CpcId = identifierFactory("CPC");
