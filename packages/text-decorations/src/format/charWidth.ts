// Code point ranges rendered two columns wide by terminals.
const WIDE_RANGES: ReadonlyArray<readonly [number, number]> = [
	[0x1100, 0x115f], // Hangul Jamo initial consonants
	[0x2e80, 0x303e], // CJK radicals, Kangxi, CJK symbols
	[0x3040, 0x33bf], // Hiragana, Katakana, Bopomofo, compatibility Jamo
	[0x3400, 0x4dbf], // CJK extension A
	[0x4e00, 0x9fff], // CJK unified ideographs
	[0xac00, 0xd7a3], // Hangul syllables
	[0xf900, 0xfaff], // CJK compatibility ideographs
	[0xfe30, 0xfe4f], // CJK compatibility forms
	[0xff00, 0xff60], // Fullwidth forms
	[0xffe0, 0xffe6], // Fullwidth signs
	[0x1f300, 0x1f64f], // Pictographs and emoticons
	[0x1f900, 0x1f9ff], // Supplemental symbols and pictographs
	[0x20000, 0x3fffd], // CJK extensions B and later
]

export const codePointWidth = (codePoint: number): number => {
	if (codePoint < 0x1100) return 1
	for (const [start, end] of WIDE_RANGES) {
		if (codePoint < start) return 1
		if (codePoint <= end) return 2
	}
	return 1
}

/**
 * Columns taken by one grapheme cluster. The leading code point decides,
 * combining marks and joiners ride along for free.
 */
export const graphemeWidth = (grapheme: string): number => {
	const codePoint = grapheme.codePointAt(0)
	return codePoint === undefined ? 0 : codePointWidth(codePoint)
}
