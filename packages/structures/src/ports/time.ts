export type Milliseconds = number
