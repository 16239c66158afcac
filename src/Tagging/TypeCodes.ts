/**
 * Equipment type → short code lookup used by the `{TYPE}` placeholder.
 */

/** One configured equipment type and the code it contributes to tags. */
export interface EquipmentTypeDefinition {
    name: string; // e.g. 'Heat Exchanger'
    code: string; // e.g. 'HX'
}

/** Built-in table; configuration may replace it. */
export const DEFAULT_EQUIPMENT_TYPES: readonly EquipmentTypeDefinition[] = Object.freeze([
    { name: `Pump`, code: `P` },
    { name: `Tank`, code: `T` },
    { name: `Vessel`, code: `V` },
    { name: `Heat Exchanger`, code: `HX` },
    { name: `Valve`, code: `VLV` },
    { name: `Filter`, code: `F` },
    { name: `Compressor`, code: `C` },
    { name: `Separator`, code: `S` },
]);

/** Resolves an equipment type to its tag code. */
export type TypeCodeLookup = (equipmentType: string) => string;

/**
 * Code for a type missing from the table: the first three characters uppercased,
 * or the whole type when it is shorter.
 * @example
 * FallbackTypeCode('Agitator'); // 'AGI'
 * FallbackTypeCode('hx'); // 'HX'
 */
export function FallbackTypeCode(equipmentType: string): string {
    return equipmentType.length >= 3 ? equipmentType.slice(0, 3).toUpperCase() : equipmentType.toUpperCase();
}

/**
 * Builds a case-insensitive lookup over the given definitions.
 * @param definitions readonly EquipmentTypeDefinition[] - Table to use (defaults to the built-in one)
 * @returns TypeCodeLookup - Function falling back to `FallbackTypeCode` for unknown types
 * @example
 * const lookup = CreateTypeCodeLookup();
 * lookup('pump'); // 'P'
 * lookup('Reactor'); // 'REA'
 */
export function CreateTypeCodeLookup(definitions: readonly EquipmentTypeDefinition[] = DEFAULT_EQUIPMENT_TYPES): TypeCodeLookup {
    const codes = new Map<string, string>();

    for (const definition of definitions) {
        const key = definition.name.trim().toLowerCase();

        if (key && !codes.has(key)) {
            codes.set(key, definition.code);
        }
    }

    return (equipmentType: string): string => {
        return codes.get(equipmentType.trim().toLowerCase()) ?? FallbackTypeCode(equipmentType);
    };
}
