import AdmZip from "adm-zip";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { MalformedFeedError } from "@wattkeeper/domain";
import { NemCsvFeedProvider, parseReportListing } from "../src/pricing/feeds/nem-csv.provider";

const LISTING_URL = "https://nem.example.com/Reports/Current/Dispatch_Reports/";
const NEWEST = "PUBLIC_DISPATCH_202511182020_20251118201515_LEGACY.zip";
const OLDER = "PUBLIC_DISPATCH_202511182015_20251118201023_LEGACY.zip";

const LISTING = `<html><body><pre>
<a href="/Reports/Current/">[To Parent Directory]</a><br>
Tuesday, November 18, 2025  8:10 PM   21034 <a href="/Reports/Current/Dispatch_Reports/${OLDER}">${OLDER}</a><br>
Tuesday, November 18, 2025  8:15 PM   21101 <a href="${NEWEST}">${NEWEST}</a><br>
Tuesday, November 18, 2025  8:15 PM     512 <a href="PUBLIC_DISPATCH_202511182025_notes.txt">notes</a><br>
</pre></body></html>`;

const DISPATCH_REPORT = [
  "C,NEMP.WORLD,DREGION,AEMO,PUBLIC,2025/11/18,20:15:23,0000000483452183,DREGION,0000000483452177",
  "I,DREGION,,2,SETTLEMENTDATE,RUNNO,REGIONID,INTERVENTION,RRP,EEP,ROP",
  "D,DREGION,,2,\"2025/11/18 20:20:00\",1,NSW1,0,101.5,0,101.5",
  "D,DREGION,,2,\"2025/11/18 20:20:00\",1,VIC1,0,87.25,0,87.25",
].join("\r\n");

function zipOf(entries: Record<string, string>): Buffer {
  const archive = new AdmZip();
  for (const [name, content] of Object.entries(entries)) {
    archive.addFile(name, Buffer.from(content, "utf8"));
  }
  return archive.toBuffer();
}

describe("NemCsvFeedProvider", () => {
  const responses = new Map<string, string | Buffer>();
  const requested: string[] = [];
  let now = Date.parse("2025-11-18T10:20:00Z");

  beforeEach(() => {
    responses.clear();
    requested.length = 0;
    now = Date.parse("2025-11-18T10:20:00Z");
    vi.stubGlobal("fetch", async (url: string) => {
      requested.push(url);
      const body = responses.get(url);
      if (body === undefined) {
        return new Response("missing", {status: 404, statusText: "Not Found"});
      }
      return new Response(body);
    });
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  function listingProvider(): NemCsvFeedProvider {
    return new NemCsvFeedProvider({tier: "historical", url: LISTING_URL, listing: true, timeoutMs: 1000, now: () => now});
  }

  it("downloads the newest listed report and reads the CSV inside the archive", async () => {
    responses.set(LISTING_URL, LISTING);
    responses.set(`${LISTING_URL}${NEWEST}`, zipOf({"PUBLIC_DISPATCH_202511182020_20251118201515_LEGACY.CSV": DISPATCH_REPORT}));

    const artifact = await listingProvider().fetchArtifact("VIC1");

    expect(artifact).toEqual({
      artifact: NEWEST,
      generationId: "202511182020",
      points: [{timestamp: Date.parse("2025-11-18T10:20:00Z"), value: 87.25}],
    });
    expect(requested).toEqual([LISTING_URL, `${LISTING_URL}${NEWEST}`]);
  });

  it("does not download when nothing newer than the applied generation is listed", async () => {
    responses.set(LISTING_URL, LISTING);

    const artifact = await listingProvider().fetchArtifact("VIC1", "202511182020");

    expect(artifact).toEqual({artifact: NEWEST, generationId: "202511182020", points: []});
    expect(requested).toEqual([LISTING_URL]);
  });

  it("reuses the listing and the archive while walking regions", async () => {
    responses.set(LISTING_URL, LISTING);
    responses.set(`${LISTING_URL}${NEWEST}`, zipOf({"report.csv": DISPATCH_REPORT}));
    const provider = listingProvider();

    await provider.fetchArtifact("VIC1");
    const nsw = await provider.fetchArtifact("NSW1");
    expect(nsw.points).toEqual([{timestamp: Date.parse("2025-11-18T10:20:00Z"), value: 101.5}]);
    expect(requested).toHaveLength(2);

    now += 60_000;
    await provider.fetchArtifact("VIC1");
    expect(requested).toHaveLength(4);
  });

  it("rejects an archive without a CSV file", async () => {
    responses.set(LISTING_URL, LISTING);
    responses.set(`${LISTING_URL}${NEWEST}`, zipOf({"readme.txt": "nothing here"}));

    const failure = await listingProvider().fetchArtifact("VIC1").catch((error: unknown) => error);
    expect(failure).toBeInstanceOf(MalformedFeedError);
    expect(failure).toMatchObject({message: `No CSV file in ${NEWEST}`});
  });

  it("fails when the listing has no reports", async () => {
    responses.set(LISTING_URL, "<html><body>empty</body></html>");

    await expect(listingProvider().fetchArtifact("VIC1"))
      .rejects.toThrow(`No zipped reports listed at ${LISTING_URL}`);
  });

  it("still reads a plain CSV from a fixed URL", async () => {
    const url = "https://nem.example.com/feeds/PUBLIC_DISPATCH_202511182020.csv";
    responses.set(url, DISPATCH_REPORT);
    const provider = new NemCsvFeedProvider({tier: "historical", url, timeoutMs: 1000, now: () => now});

    const artifact = await provider.fetchArtifact("NSW1");

    expect(artifact.generationId).toBe("202511182020");
    expect(artifact.points).toEqual([{timestamp: Date.parse("2025-11-18T10:20:00Z"), value: 101.5}]);
  });
});

describe("parseReportListing", () => {
  it("resolves zipped report links against the page and ignores everything else", () => {
    expect(parseReportListing(LISTING, LISTING_URL)).toEqual([
      {name: OLDER, url: `${LISTING_URL}${OLDER}`, generationId: "202511182015"},
      {name: NEWEST, url: `${LISTING_URL}${NEWEST}`, generationId: "202511182020"},
    ]);
  });
});
