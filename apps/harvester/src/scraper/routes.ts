import type { RouteSpec, RouteTask } from './types.js'

export function slugify(value: string): string {
  return value
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '')
}

/**
 * `origin:destination`, or `origin:destination:YYYY-MM-DD` for a dated search.
 */
export function routeKeyFor(route: RouteSpec): string {
  const base = `${slugify(route.origin)}:${slugify(route.destination)}`
  return route.journeyDate ? `${base}:${route.journeyDate}` : base
}

export function createRouteTask(route: RouteSpec): RouteTask {
  return {
    routeKey: routeKeyFor(route),
    origin: route.origin.trim(),
    destination: route.destination.trim(),
    journeyDate: route.journeyDate ?? null,
    cursor: { pageIndex: 0, reviewCursor: null },
    status: 'pending',
  }
}

/**
 * `Origin:Destination` or `Origin:Destination:YYYY-MM-DD`, as passed on the command line.
 */
export function parseRouteArg(arg: string): RouteSpec {
  const [origin, destination, journeyDate, ...rest] = arg.split(':').map((part) => part.trim())
  if (!origin || !destination || rest.length > 0) {
    throw new RangeError(`Route must look like Origin:Destination[:YYYY-MM-DD], got "${arg}"`)
  }
  if (journeyDate !== undefined && !/^\d{4}-\d{2}-\d{2}$/.test(journeyDate)) {
    throw new RangeError(`Journey date must be YYYY-MM-DD, got "${journeyDate}"`)
  }
  return { origin, destination, journeyDate: journeyDate ?? null }
}
