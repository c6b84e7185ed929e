function isObject(value: unknown): value is object {
  return (typeof value === "object" || typeof value === "function") && value !== null;
}

// A link whose properties cannot be read ends that branch of the walk.
function causeOf(link: unknown): unknown {
  try {
    return isObject(link) && "cause" in link ? link.cause : undefined;
  } catch {
    return undefined;
  }
}

function membersOf(link: AggregateError): unknown[] {
  try {
    const { errors } = link;
    return Array.isArray(errors) ? [...errors] : [];
  } catch {
    return [];
  }
}

/**
 * Walk every link reachable from `err` through `cause`, depth-first.
 *
 * An `AggregateError` yields its `errors` before its own `cause`. Links that
 * were already visited end that branch, so a cyclic chain terminates.
 */
export function* walkErrorChain(err: unknown): Generator<unknown, void, undefined> {
  const seen = new Set<unknown>();
  const stack: unknown[] = [err];

  while (stack.length > 0) {
    const link = stack.pop();
    if (link === undefined || link === null || seen.has(link)) continue;
    seen.add(link);
    yield link;

    // Pushed in reverse so the stack pops them in declaration order.
    const next: unknown[] = [];
    if (link instanceof AggregateError) next.push(...membersOf(link));
    next.push(causeOf(link));
    for (let i = next.length - 1; i >= 0; i--) stack.push(next[i]);
  }
}

export function findInChain<T>(
  err: unknown,
  predicate: (link: unknown) => link is T,
): T | undefined;
export function findInChain(
  err: unknown,
  predicate: (link: unknown) => boolean,
): unknown;
export function findInChain(
  err: unknown,
  predicate: (link: unknown) => boolean,
): unknown {
  for (const link of walkErrorChain(err)) {
    if (predicate(link)) return link;
  }
  return undefined;
}

export function chainContains(err: unknown, target: unknown): boolean {
  return findInChain(err, (link) => link === target) !== undefined;
}
