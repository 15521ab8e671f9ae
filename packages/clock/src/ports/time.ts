/** A duration or an instant expressed in milliseconds. */
export type Milliseconds = number

export type Seconds = number
