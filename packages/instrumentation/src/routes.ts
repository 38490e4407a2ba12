export interface RouteSettings {
  name?: string | null;
  arguments?: unknown;
}

/**
 * The host navigation stack's view of a route. Route objects are not
 * guaranteed to be the same instance on push and pop; only the resolved
 * name is used to pair the two.
 */
export interface RouteLike {
  settings: RouteSettings;
  /** Route type, e.g. `MaterialPageRoute` or `DialogRoute`. */
  kind: string;
  /** Dialogs, sheets and menus drawn over the current screen. */
  isPopup?: boolean;
}

const routeHashes = new WeakMap<RouteLike, number>();
let nextRouteHash = 1;

function hashOf(route: RouteLike): number {
  let hash = routeHashes.get(route);
  if (hash === undefined) {
    hash = nextRouteHash++;
    routeHashes.set(route, hash);
  }
  return hash;
}

function routeNameArgument(args: unknown): string | null {
  if (typeof args !== "object" || args === null || !("routeName" in args)) {
    return null;
  }
  const { routeName } = args;
  return typeof routeName === "string" && routeName.length > 0 ? routeName : null;
}

/**
 * Explicit name, then a `routeName` argument, then `<kind>#<hex hash>` unique
 * to the route object.
 */
export function resolveRouteName(route: RouteLike): string {
  const { name } = route.settings;
  if (name) {
    return name;
  }

  const fromArguments = routeNameArgument(route.settings.arguments);
  if (fromArguments) {
    return fromArguments;
  }

  return `${route.kind}#${hashOf(route).toString(16)}`;
}
