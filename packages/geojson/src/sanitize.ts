export type JsonObject = { [key: string]: unknown };

export function isJsonObject(value: unknown): value is JsonObject {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Remove, in place, every member whose value is null, descending into nested objects.
 * Arrays are left alone, including any objects inside them.
 * Running it twice changes nothing the second time.
 */
export function stripNulls(jsonObject: JsonObject): void {
    for (const key of Object.keys(jsonObject)) {
        const member = jsonObject[key];
        if (member === null || member === undefined) {
            delete jsonObject[key];
        } else if (isJsonObject(member)) {
            stripNulls(member);
        }
    }
}
