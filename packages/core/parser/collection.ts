import debug from "debug";
import { EdneParser } from "./base";
import { type RecordKind, parseRecordLine } from "./record-kind";

/** Logger for collection loading */
const logger = debug("edne:parser");

/**
 * Records of one kind, keyed by their own identifier.
 *
 * A later record with an identifier already present replaces the earlier one.
 * Iteration follows first-insertion order of each identifier.
 */
export class EdneCollection<Id, Rec> implements Iterable<Rec> {
    /** Descriptor of the record kind held */
    readonly kind: RecordKind<Id, Rec>;

    private readonly records = new Map<Id, Rec>();

    constructor(kind: RecordKind<Id, Rec>) {
        this.kind = kind;
    }

    /**
     * Parses every line of a source into this collection.
     *
     * Stops at the first failing line; callers construct a fresh collection
     * per source, so a failure leaves nothing half-loaded behind.
     *
     * @param parser - Source to read.
     * @returns This collection.
     * @throws {ParseError} From the first line that fails to parse.
     */
    protected load(parser: EdneParser): this {
        let lines = 0;
        for (const [lineNumber, line] of parser.lines()) {
            this.insert(parseRecordLine(this.kind, line, lineNumber));
            lines++;
        }
        logger(
            `parsed ${lines} ${this.kind.name} lines into ${this.records.size} records`,
        );
        return this;
    }

    /**
     * Adds a record, replacing any record with the same identifier.
     */
    insert(record: Rec): void {
        this.records.set(this.kind.idOf(record), record);
    }

    get(id: Id): Rec | undefined {
        return this.records.get(id);
    }

    has(id: Id): boolean {
        return this.records.has(id);
    }

    get size(): number {
        return this.records.size;
    }

    isEmpty(): boolean {
        return this.records.size === 0;
    }

    values(): IterableIterator<Rec> {
        return this.records.values();
    }

    entries(): IterableIterator<[Id, Rec]> {
        return this.records.entries();
    }

    [Symbol.iterator](): IterableIterator<Rec> {
        return this.records.values();
    }
}
