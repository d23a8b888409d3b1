// src/map/maplibre-services/MapLibreLayerFactory.ts

import type {
  CircleLayerSpecification,
  FillLayerSpecification,
  LayerSpecification,
  LineLayerSpecification,
} from 'maplibre-gl';
import type { IFeatureLayer } from '../IMapInterfaces';

export interface FeatureLayerColors {
  color: string;
  selectionColor: string;
}

type ColorValue = NonNullable<CircleLayerSpecification['paint']>['circle-color'];

/** Feature-state key toggled for selected features. */
export const SELECTED_STATE = 'selected';

/**
 * Factory to compose MapLibre LayerSpecifications for a feature layer.
 * Selected features are drawn with the selection color through feature-state.
 */
export class MapLibreLayerFactory {
  /**
   * Compose the MapLibre layer specs for a loaded feature layer.
   * Returns an array because polygons map to a fill and an outline layer.
   */
  static createLayers(layer: IFeatureLayer, nativeSourceId: string, colors: FeatureLayerColors): LayerSpecification[] {
    const color = MapLibreLayerFactory.selectionAwareColor(colors);

    switch (layer.geometryType) {
      case 'point':
      case 'multipoint': {
        const circle: CircleLayerSpecification = {
          id: `${layer.id}-circle`,
          type: 'circle',
          source: nativeSourceId,
          paint: {
            'circle-color': color,
            'circle-radius': 6,
            'circle-stroke-color': '#ffffff',
            'circle-stroke-width': 1,
          },
        };
        return [circle];
      }
      case 'polyline': {
        const line: LineLayerSpecification = {
          id: `${layer.id}-line`,
          type: 'line',
          source: nativeSourceId,
          paint: {
            'line-color': color,
            'line-width': 2,
          },
        };
        return [line];
      }
      case 'polygon': {
        const fill: FillLayerSpecification = {
          id: `${layer.id}-fill`,
          type: 'fill',
          source: nativeSourceId,
          paint: {
            'fill-color': color,
            'fill-opacity': 0.5,
          },
        };
        const outline: LineLayerSpecification = {
          id: `${layer.id}-outline`,
          type: 'line',
          source: nativeSourceId,
          paint: {
            'line-color': color,
            'line-width': 1,
          },
        };
        return [fill, outline];
      }
      case null:
        return [];
    }
  }

  private static selectionAwareColor(colors: FeatureLayerColors): ColorValue {
    return [
      'case',
      ['boolean', ['feature-state', SELECTED_STATE], false],
      colors.selectionColor,
      colors.color,
    ];
  }
}
