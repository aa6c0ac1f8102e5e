/** Duration or instant expressed in milliseconds. */
export type Milliseconds = number

/** Duration expressed in seconds. */
export type Seconds = number
