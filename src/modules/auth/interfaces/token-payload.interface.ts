/** Claim name to value. `sub` identifies the user. */
export type ClaimsSet = Record<string, unknown>;

export type IssuedClaims = ClaimsSet & { exp: number };

export const subjectOf = (claims: ClaimsSet): string | undefined => {
  const { sub } = claims;
  return typeof sub === 'string' && sub.length > 0 ? sub : undefined;
};
