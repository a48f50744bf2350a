import { writeFile } from 'fs/promises';

/**
 * Binary PPM (P6) of an RGBA8 frame. Alpha is dropped.
 */
export function encodePpm(width: number, height: number, rgba: Uint8Array): Buffer {
    if (rgba.length !== width * height * 4) {
        throw new RangeError(`Expected ${width * height * 4} bytes for ${width}x${height}, got ${rgba.length}`);
    }

    const header = Buffer.from(`P6\n${width} ${height}\n255\n`, 'ascii');
    const body = Buffer.alloc(width * height * 3);
    for (let src = 0, dst = 0; src < rgba.length; src += 4, dst += 3) {
        body[dst] = rgba[src];
        body[dst + 1] = rgba[src + 1];
        body[dst + 2] = rgba[src + 2];
    }
    return Buffer.concat([header, body]);
}

export async function writePpm(file: string, width: number, height: number, rgba: Uint8Array): Promise<void> {
    await writeFile(file, encodePpm(width, height, rgba));
}
