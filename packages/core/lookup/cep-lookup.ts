import type { CepInfo } from "./cep-info";
import { type Uf, UFS } from "../models/uf";

/**
 * Read-only CEP index produced by {@link CepLookupBuilder.build}.
 */
export class CepLookup implements Iterable<CepInfo> {
    private readonly ceps: ReadonlyMap<string, CepInfo>;

    /**
     * @param ceps - Entries keyed by CEP. The map is taken over, not copied.
     */
    constructor(ceps: ReadonlyMap<string, CepInfo> = new Map()) {
        this.ceps = ceps;
    }

    /**
     * Resolves a CEP to its entry. Matching is exact: no trimming, no
     * formatting, no approximate matches.
     */
    lookup(cep: string): CepInfo | undefined {
        return this.ceps.get(cep);
    }

    get(cep: string): CepInfo | undefined {
        return this.ceps.get(cep);
    }

    has(cep: string): boolean {
        return this.ceps.has(cep);
    }

    /**
     * Entries of one state, in index order.
     */
    byState(uf: Uf): CepInfo[] {
        return [...this.ceps.values()].filter((info) => info.uf === uf);
    }

    /**
     * Entries whose locality name equals `name` exactly.
     */
    byLocalityName(name: string): CepInfo[] {
        return [...this.ceps.values()].filter(
            (info) => info.locality === name,
        );
    }

    get size(): number {
        return this.ceps.size;
    }

    isEmpty(): boolean {
        return this.ceps.size === 0;
    }

    values(): IterableIterator<CepInfo> {
        return this.ceps.values();
    }

    [Symbol.iterator](): IterableIterator<CepInfo> {
        return this.ceps.values();
    }

    /**
     * Entry count per state, in UF order. States without entries are left out.
     */
    countByState(): Array<[Uf, number]> {
        const counts = new Map<Uf, number>();
        for (const info of this.ceps.values()) {
            counts.set(info.uf, (counts.get(info.uf) ?? 0) + 1);
        }
        return UFS.flatMap((uf): Array<[Uf, number]> => {
            const count = counts.get(uf);
            return count === undefined ? [] : [[uf, count]];
        });
    }
}
