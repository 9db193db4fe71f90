/**
 * Recursively freeze a plain data structure and return it with a readonly view.
 * Snapshots handed out by the world and the kernel go through here.
 */
export function deepFreeze<T>(value: T): T {
    if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
        Object.freeze(value);
        for (const key of Object.keys(value)) {
            deepFreeze(Reflect.get(value, key));
        }
    }
    return value;
}
