/**
 * DashboardMetaTagExtractor
 *
 * og:title → 앱 이름 (" - " 앞부분)
 * og:description / description → 다운로드 수 ("12K downloads")
 */

import type { ISnapshotExtractor } from "@/extractors/base/ISnapshotExtractor";
import type { PageSnapshot } from "@/extractors/base/PageSnapshot";
import { firstGroup } from "@/extractors/base/FieldStrategy";
import type { DashboardFields } from "./DashboardFields";

const DOWNLOADS_IN_DESCRIPTION = /(\d+[KMB]?)\s*downloads?/i;

export class DashboardMetaTagExtractor implements ISnapshotExtractor<DashboardFields> {
  async extract(snapshot: PageSnapshot): Promise<DashboardFields> {
    const fields: DashboardFields = {};

    const ogTitle = await snapshot.metaContent("og:title");
    const name = ogTitle?.split(" - ")[0]?.trim();
    if (name) {
      fields.app_name = name;
    }

    const description =
      (await snapshot.metaContent("og:description")) ??
      (await snapshot.metaContent("description"));
    const downloads = firstGroup(description, DOWNLOADS_IN_DESCRIPTION);
    if (downloads) {
      fields.downloads_worldwide = downloads;
    }

    return fields;
  }
}
