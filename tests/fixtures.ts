/** Rows of per-box attributes → flat [1, C, N] buffer. */
export function channelFirst(rows: number[][]): Float32Array {
    const numBoxes = rows.length;
    const elemPerBox = rows[0]?.length ?? 0;
    const data = new Float32Array(numBoxes * elemPerBox);
    rows.forEach((row, box) => {
        row.forEach((value, attribute) => {
            data[attribute * numBoxes + box] = value;
        });
    });
    return data;
}

/** Rows of per-box attributes → flat [1, N, C] buffer. */
export function boxesFirst(rows: number[][]): Float32Array {
    return Float32Array.from(rows.flat());
}
