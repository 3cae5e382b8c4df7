/**
 * @module http/map-page
 *
 * The interactive map served at `/`: a MapLibre page that draws the
 * building tiles over OpenStreetMap and reports its viewport to
 * `/update-view` after every move.
 *
 * The page is `assets/map.html` with `{{name}}` placeholders. Values are
 * validated before they get here, so they are inserted as they are.
 */

import { readFile } from 'node:fs/promises';

const TEMPLATE_URL = new URL('../../assets/map.html', import.meta.url);

export interface MapPageParams {
  lng: number;
  lat: number;
  zoom: number;
  minZoom: number;
  /** Highest zoom the map requests tiles for; it overzooms beyond. */
  sourceMaxZoom: number;
  layerName: string;
  /** `#rrggbb` */
  color: string;
  opacity: number;
}

let template: Promise<string> | null = null;

function loadTemplate(): Promise<string> {
  if (template === null) {
    template = readFile(TEMPLATE_URL, 'utf8');
    // Retry the read on the next request if it failed.
    void template.catch(() => {
      template = null;
    });
  }
  return template;
}

export async function renderMapPage(params: MapPageParams): Promise<string> {
  const html = await loadTemplate();
  const values: Record<string, string> = {
    lng: String(params.lng),
    lat: String(params.lat),
    zoom: String(params.zoom),
    minZoom: String(params.minZoom),
    sourceMaxZoom: String(params.sourceMaxZoom),
    layerName: params.layerName,
    color: params.color,
    opacity: String(params.opacity),
  };
  return html.replace(/\{\{(\w+)\}\}/g, (match, name: string) => values[name] ?? match);
}
