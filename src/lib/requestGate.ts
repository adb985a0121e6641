/**
 * Orders overlapping async loads: `begin()` hands out a check that stays true only
 * until the next `begin()`, so a slow earlier response can be dropped.
 */
export interface RequestGate {
  begin(): () => boolean;
}

export function createRequestGate(): RequestGate {
  let latest = 0;
  return {
    begin() {
      const ticket = ++latest;
      return () => ticket === latest;
    },
  };
}
