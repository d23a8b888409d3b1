import type { IMapAdapter } from '../../map/IMapAdapter';
import { BrewmapMapElement } from './brewmap-map';

function queryWithSelector(selector: string): BrewmapMapElement | null {
  try {
    const candidate = document.querySelector(selector);
    return candidate instanceof BrewmapMapElement ? candidate : null;
  } catch (error) {
    console.error(`[brewmap] Invalid selector "${selector}" provided via map attribute.`, error);
    return null;
  }
}

/**
 * Finds the `<brewmap-map>` a component belongs to: the `map` attribute selector,
 * then the closest ancestor, then the first one in the document.
 */
export function resolveMapElement(host: HTMLElement): BrewmapMapElement | null {
  const explicitSelector = host.getAttribute('map');
  if (explicitSelector) {
    const explicitMatch = queryWithSelector(explicitSelector);
    if (!explicitMatch) {
      console.error(`[brewmap] No <brewmap-map> found for selector "${explicitSelector}" on ${host.tagName.toLowerCase()}.`);
    }
    return explicitMatch;
  }

  const ancestor = host.closest('brewmap-map');
  if (ancestor) {
    return ancestor;
  }

  const fallback = document.querySelector('brewmap-map');
  if (fallback) {
    return fallback;
  }

  console.error(`[brewmap] Unable to locate a <brewmap-map> for ${host.tagName.toLowerCase()}.`);
  return null;
}

export function resolveMapAdapter(host: HTMLElement): IMapAdapter | null {
  // Adapter creation is async (lazy-loaded engine). Components may connect before
  // it is ready; they then wait for `brewmap-map-ready`.
  return resolveMapElement(host)?.adapter ?? null;
}
