/**
 * PageSnapshot Test
 *
 * 목적: 지연 로드 + 메모이제이션, 텍스트 노드/메타 태그/JSON-LD 뷰 검증
 */

import { describe, it, expect, jest } from "@jest/globals";
import { PageSnapshot } from "@/extractors/base/PageSnapshot";
import { FixturePage } from "../../fakes/FixturePage";

const HTML = `<html><head>
<title>Notes Pro</title>
<meta property="og:title" content=" Notes Pro - Overview ">
<meta name="description" content="">
<script type="application/ld+json">{"name":"Notes Pro"}</script>
<script type="application/ld+json"></script>
</head><body>
<div id="react-root"><h1>Notes Pro</h1><p>Downloads: 2M</p></div>
<footer>Footer</footer>
<script>var ignored = true;</script>
</body></html>`;

describe("PageSnapshot", () => {
  it("본문 텍스트는 한 번만 조회해야 함", async () => {
    const page = new FixturePage(HTML);
    const getText = jest.spyOn(page, "getText");
    const snapshot = new PageSnapshot(page);

    await snapshot.bodyText();
    await snapshot.bodyText();

    expect(getText).toHaveBeenCalledTimes(1);
    expect(getText).toHaveBeenCalledWith("body");
  });

  it("텍스트 노드는 script 를 제외하고 문서 순서대로 모아야 함", async () => {
    const snapshot = new PageSnapshot(new FixturePage(HTML));

    expect(await snapshot.textNodes()).toEqual([
      "Notes Pro",
      "Downloads: 2M",
      "Footer",
    ]);
    expect(await snapshot.pageText()).toBe("Notes Pro\nDownloads: 2M\nFooter");
  });

  it("scope selector 영역 텍스트를 반환해야 함", async () => {
    const scoped = new PageSnapshot(new FixturePage(HTML), "#react-root");
    const unscoped = new PageSnapshot(new FixturePage(HTML));

    expect(await scoped.scopedText()).toBe("Notes ProDownloads: 2M");
    expect(await unscoped.scopedText()).toBeNull();
  });

  it("메타 태그 content 를 trim 해서 반환하고 빈 값은 undefined 이어야 함", async () => {
    const snapshot = new PageSnapshot(new FixturePage(HTML));

    expect(await snapshot.metaContent("og:title")).toBe("Notes Pro - Overview");
    expect(await snapshot.metaContent("description")).toBeUndefined();
    expect(await snapshot.metaContent("og:image")).toBeUndefined();
  });

  it("비어 있지 않은 JSON-LD 블록만 반환해야 함", async () => {
    const snapshot = new PageSnapshot(new FixturePage(HTML));

    expect(await snapshot.jsonLdBlocks()).toEqual(['{"name":"Notes Pro"}']);
  });
});
