/** Network endpoint of a seed member, e.g. `10.0.0.1:4801`. Opaque to this package. */
export type Address = string;
