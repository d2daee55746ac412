declare const brand: unique symbol;
export type Brand<T, B extends string> = T & { readonly [brand]: B };

export type GroupKey = Brand<string, "GroupKey">;
export type IdentityKey = Brand<string, "IdentityKey">;

export const groupKey = (key: string): GroupKey => key as GroupKey;
export const identityKey = (key: string): IdentityKey => key as IdentityKey;
