/**
 * 브라우저 컨텍스트 실행 스크립트
 *
 * NOTE: evaluateScript()는 함수를 직렬화하므로
 * - 모듈 import / 클로저 변수 / 상수 참조 불가
 * - Node, NodeFilter 전역 대신 숫자 상수 사용
 * - innerText 대신 textContent (jsdom 테스트 환경 호환)
 */

/**
 * 표 스냅샷 (행 × 셀 텍스트)
 */
export interface TableSnapshot {
  text: string;
  rows: string[][];
}

/**
 * body 아래 모든 텍스트 노드 (script/style 제외, trim, 빈 값 제외)
 */
export function collectTextNodes(): string[] {
  const texts: string[] = [];
  const body = document.body;
  if (!body) {
    return texts;
  }

  // 4 = NodeFilter.SHOW_TEXT
  const walker = document.createTreeWalker(body, 4);
  let node = walker.nextNode();
  while (node) {
    const parentTag = node.parentElement ? node.parentElement.tagName : "";
    if (parentTag !== "SCRIPT" && parentTag !== "STYLE" && parentTag !== "NOSCRIPT") {
      const value = (node.textContent || "").trim();
      if (value) {
        texts.push(value);
      }
    }
    node = walker.nextNode();
  }
  return texts;
}

/**
 * 짧은 텍스트(200자 미만)를 가진 요소들의 textContent
 * 중복 제거, 문서 순서 유지
 */
export function collectShortElementTexts(): string[] {
  const seen: Record<string, boolean> = {};
  const texts: string[] = [];
  const body = document.body;
  if (!body) {
    return texts;
  }

  const elements = body.querySelectorAll("*");
  for (let i = 0; i < elements.length; i++) {
    const tag = elements[i].tagName;
    if (tag === "SCRIPT" || tag === "STYLE" || tag === "NOSCRIPT") {
      continue;
    }
    const text = (elements[i].textContent || "").replace(/\s+/g, " ").trim();
    if (text && text.length < 200 && !seen[text]) {
      seen[text] = true;
      texts.push(text);
    }
  }
  return texts;
}

/**
 * 메인 콘텐츠 영역(#react-root, 없으면 body)의 표
 */
export function collectMainContentTables(): TableSnapshot[] {
  const root = document.getElementById("react-root") || document.body;
  if (!root) {
    return [];
  }

  const tables: TableSnapshot[] = [];
  const tableElements = root.querySelectorAll("table");
  for (let t = 0; t < tableElements.length; t++) {
    const rows: string[][] = [];
    const rowElements = tableElements[t].querySelectorAll("tr");
    for (let r = 0; r < rowElements.length; r++) {
      const cells: string[] = [];
      const cellElements = rowElements[r].querySelectorAll("th, td");
      for (let c = 0; c < cellElements.length; c++) {
        cells.push((cellElements[c].textContent || "").replace(/\s+/g, " ").trim());
      }
      rows.push(cells);
    }
    tables.push({
      text: (tableElements[t].textContent || "").replace(/\s+/g, " ").trim(),
      rows,
    });
  }
  return tables;
}
