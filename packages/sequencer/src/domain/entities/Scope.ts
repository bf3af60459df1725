/** Opaque name of a numbering domain; numbers are unique inside one scope only. */
export type Scope = string;
