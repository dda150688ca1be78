const esc = (code: string) => `\x1b[${code}m`;
const reset = esc('0');

export const bold = (s: string) => `${esc('1')}${s}${reset}`;
export const dim = (s: string) => `${esc('2')}${s}${reset}`;

export const blue = (s: string) => `${esc('34')}${s}${reset}`;
export const green = (s: string) => `${esc('32')}${s}${reset}`;
export const yellow = (s: string) => `${esc('33')}${s}${reset}`;
export const red = (s: string) => `${esc('31')}${s}${reset}`;
