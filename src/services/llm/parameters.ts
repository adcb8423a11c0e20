import { ParameterDefinition, ParameterValue } from '../../types';

export const DEFAULT_MAX_TOKENS = 1000;
export const DEFAULT_TEMPERATURE = 0.7;

export function findParameter(
    parameters: readonly ParameterDefinition[],
    name: string,
): ParameterDefinition | undefined {
    const wanted = name.toLowerCase();
    return parameters.find((p) => p.name.toLowerCase() === wanted);
}

/** Integer default of a parameter, or the fallback when missing or not an integer. */
export function resolveInteger(
    parameters: readonly ParameterDefinition[],
    name: string,
    fallback: number,
): number {
    const value = findParameter(parameters, name)?.default;
    return typeof value === 'number' && Number.isInteger(value) ? value : fallback;
}

/** Numeric default of a parameter, or the fallback when missing or not a number. */
export function resolveNumber(
    parameters: readonly ParameterDefinition[],
    name: string,
    fallback: number,
): number {
    const value = findParameter(parameters, name)?.default;
    return typeof value === 'number' && Number.isFinite(value) ? value : fallback;
}

/**
 * Every parameter that carries a usable default, keyed by name. Names compare
 * case-insensitively: the first spelling is kept, the last value wins.
 */
export function collectDefaults(
    parameters: readonly ParameterDefinition[],
): Record<string, ParameterValue> {
    const result: Record<string, ParameterValue> = {};
    const keys = new Map<string, string>();

    for (const parameter of parameters) {
        const value = parameter.default;
        if (value === undefined) continue;
        if (typeof value === 'number' && !Number.isFinite(value)) continue;
        if (typeof value === 'string' && value.length === 0) continue;

        const lowered = parameter.name.toLowerCase();
        const key = keys.get(lowered) ?? parameter.name;
        keys.set(lowered, key);
        result[key] = value;
    }

    return result;
}
