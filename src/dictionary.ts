/**
 * Copyright (c) 2024 Discover Financial Services
*/
import * as fs from "fs";
import * as path from "path";

/**
 * The characters a recognition model can emit, by class index.  Index 0 is
 * the CTC blank; the remaining entries are the lines of a dictionary file.
 */
export class CharDictionary {

    public static readonly BLANK = "blank";

    /** Printable ASCII, shipped with the package. */
    public static readonly defaultPath = path.join(__dirname, "..", "dicts", "ascii_dict.txt");

    /**
     * One trimmed entry per line, so class i is always line i-1.  Empty lines
     * stay as empty entries; only the piece after a final newline is dropped.
     */
    public static fromText(text: string): CharDictionary {
        const lines = text.split(/\r?\n/);
        if (lines.length > 0 && lines[lines.length - 1] === "") lines.pop();
        return new CharDictionary(lines.map((l) => l.trim()));
    }

    public static async fromFile(file?: string): Promise<CharDictionary> {
        file = file || CharDictionary.defaultPath;
        const text = await fs.promises.readFile(file, "utf8");
        return CharDictionary.fromText(text);
    }

    private readonly entries: string[];

    constructor(chars: string[]) {
        this.entries = [CharDictionary.BLANK, ...chars];
    }

    /** Number of classes, the blank included. */
    public get size(): number {
        return this.entries.length;
    }

    public charAt(idx: number): string | undefined {
        return this.entries[idx];
    }

    /** Class index of a character, or -1. */
    public indexOf(ch: string): number {
        return this.entries.indexOf(ch, 1);
    }

}
