/**
 * Display variants of right-to-left output, for clients that render
 * translated text outside an RTL-aware layout.
 */

/** U+202E RIGHT-TO-LEFT OVERRIDE */
const RTL_OVERRIDE = '\u202E';
/** U+202C POP DIRECTIONAL FORMATTING */
const POP_DIRECTIONAL = '\u202C';

export const RTL_CSS_ATTRIBUTES = 'dir="rtl" style="text-align: right; direction: rtl;"';

const RTL_BLOCK_STYLE = 'text-align: right; direction: rtl; unicode-bidi: bidi-override;';

export interface RtlDisplayOptions {
    /** Text between directional override markers, for terminals. */
    terminalRtl: string;
    htmlRtl: string;
    cssAttributes: string;
}

export function addRtlMarkers(text: string): string {
    return `${RTL_OVERRIDE}${text}${POP_DIRECTIONAL}`;
}

/** Wraps already-translated text or HTML in an RTL block. */
export function wrapHtmlRtl(text: string): string {
    return `<div dir="rtl" style="${RTL_BLOCK_STYLE}">${text}</div>`;
}

export function buildRtlDisplayOptions(text: string): RtlDisplayOptions {
    return {
        terminalRtl: addRtlMarkers(text),
        htmlRtl: wrapHtmlRtl(text),
        cssAttributes: RTL_CSS_ATTRIBUTES
    };
}
