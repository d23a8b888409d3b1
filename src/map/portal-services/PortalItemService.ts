// src/map/portal-services/PortalItemService.ts

import { getItem } from '@esri/arcgis-rest-portal';
import type { IItem } from '@esri/arcgis-rest-portal';
import type { IPortalItem } from '../IMapInterfaces';
import { Loadable } from '../Loadable';

const SHARING_REST_PATH = '/sharing/rest';

/**
 * Turns a portal base URL (https://www.arcgis.com) into its REST root
 * (https://www.arcgis.com/sharing/rest). URLs that already point at the REST root are kept.
 */
export function toSharingRestUrl(portalUrl: string): string {
    const trimmed = portalUrl.replace(/\/+$/, '');
    return trimmed.endsWith(SHARING_REST_PATH) ? trimmed : `${trimmed}${SHARING_REST_PATH}`;
}

/**
 * A portal item resolved with the ArcGIS REST JS portal client.
 */
export class PortalItem extends Loadable implements IPortalItem {
    private item: IItem | null = null;

    constructor(
        public readonly portalUrl: string,
        public readonly itemId: string
    ) {
        super();
    }

    public get title(): string | null {
        return this.item?.title ?? null;
    }

    public get serviceUrl(): string | null {
        return this.item?.url ?? null;
    }

    /** Item type as reported by the portal, e.g. "Feature Service". */
    public get type(): string | null {
        return this.item?.type ?? null;
    }

    protected async doLoad(): Promise<void> {
        const portal = toSharingRestUrl(this.portalUrl);
        console.log(`[PORTAL ITEM] Fetching item ${this.itemId} from ${portal}`);
        this.item = await getItem(this.itemId, { portal });
        console.log(`[PORTAL ITEM] Loaded "${this.item.title}" (${this.item.type})`);
    }
}
