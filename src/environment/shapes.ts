/**
 * Built-in 3x3 surface shapes carried by grid objects.
 * Random placement draws from this list; tests and scenarios pick by name.
 */

import type { ShapePattern } from "./interface.js";

export interface NamedShape {
    name: string;
    pattern: ShapePattern;
}

export const SHAPE_LIBRARY: readonly NamedShape[] = [
    {
        name: "A",
        pattern: [
            [0, 1, 0],
            [1, 1, 1],
            [1, 0, 1],
        ],
    },
    {
        name: "B",
        pattern: [
            [1, 1, 0],
            [1, 1, 1],
            [1, 1, 0],
        ],
    },
    {
        name: "L",
        pattern: [
            [1, 0, 0],
            [1, 0, 0],
            [1, 1, 1],
        ],
    },
    {
        name: "T",
        pattern: [
            [1, 1, 1],
            [0, 1, 0],
            [0, 1, 0],
        ],
    },
    {
        name: "X",
        pattern: [
            [1, 0, 1],
            [0, 1, 0],
            [1, 0, 1],
        ],
    },
];

export function getShape(name: string): ShapePattern {
    const found = SHAPE_LIBRARY.find((s) => s.name === name);
    if (!found) {
        throw new Error(`Unknown shape: ${name}`);
    }
    return found.pattern;
}
