import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, expect, test } from "vitest";
import { classifyFileName, classifyFolder } from "../../audio/classifyFiles.js";
import { fixedClock } from "../../utils/clock.js";

const tempDirs: string[] = [];

afterEach(() => {
  for (const dir of tempDirs.splice(0)) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
});

function makeFolder(name: string, files: Record<string, number>): string {
  const root = fs.mkdtempSync(path.join(os.tmpdir(), "classify-"));
  tempDirs.push(root);
  const folder = path.join(root, name);
  fs.mkdirSync(folder);
  for (const [fileName, size] of Object.entries(files)) {
    fs.writeFileSync(path.join(folder, fileName), Buffer.alloc(size));
  }
  return folder;
}

test("file names classify in priority order", () => {
  expect(classifyFileName("MIC3.mp3")).toEqual({ kind: "mic", micNumber: 3, slot: 2, pattern: "mic" });
  expect(classifyFileName("2_Speaker1.wav")).toEqual({ kind: "mic", micNumber: 2, slot: 1, pattern: "legacySpeaker" });
  expect(classifyFileName("sound_pad.wav")).toEqual({ kind: "auxiliary", role: "soundPad" });
  expect(classifyFileName("PHONE.m4a")).toEqual({ kind: "auxiliary", role: "phone" });
  expect(classifyFileName("2024_0315_1900.wav")).toEqual({ kind: "master", reason: "timestamp" });
  expect(classifyFileName("Group Audio.m4a")).toEqual({ kind: "master", reason: "keyword" });
  expect(classifyFileName("MIC0.wav")).toEqual({ kind: "unidentified" });
});

test("mic files get slots and the timestamped recording becomes MASTER_MIX", () => {
  const folder = makeFolder("2024-March-Inception", {
    "MIC1.wav": 100,
    "MIC2.wav": 100,
    "2024_0315_1900.wav": 300,
    "PHONE.wav": 50,
    "notes.txt": 10,
  });

  const result = classifyFolder(folder, { clock: fixedClock("2024-03-16T10:00:00.000Z") });

  expect(result.masterDecision).toBe("pattern");
  expect(result.audioFiles.map((f) => f.fileName)).toEqual(["MASTER_MIX.wav", "MIC1.wav", "MIC2.wav", "PHONE.wav"]);

  const [master, mic1, mic2, phone] = result.audioFiles;
  expect(master.isMasterRecording).toBe(true);
  expect(master.filePath).toBe(path.join(folder, "MASTER_MIX.wav"));
  expect(master.speakerSlot).toBeUndefined();
  expect(mic1.speakerSlot).toBe(0);
  expect(mic2.speakerSlot).toBe(1);
  expect(phone.auxiliaryRole).toBe("phone");
  expect(phone.speakerSlot).toBeUndefined();
  expect(mic1.processingStatus).toBe("Pending");
  expect(mic1.lastUpdated).toBe("2024-03-16T10:00:00.000Z");

  expect(fs.existsSync(path.join(folder, "MASTER_MIX.wav"))).toBe(true);
  expect(fs.existsSync(path.join(folder, "2024_0315_1900.wav"))).toBe(false);
});

test("a single unidentified file is the master by elimination", () => {
  const folder = makeFolder("2024-04-02_Heat", { "MIC1.wav": 10, "recording.wav": 20 });

  const result = classifyFolder(folder);

  expect(result.masterDecision).toBe("elimination");
  expect(result.master?.fileName).toBe("MASTER_MIX.wav");
  expect(result.unidentified).toEqual([]);
});

test("several unidentified files pick the largest and leave the rest unidentified", () => {
  const folder = makeFolder("session", { "a.wav": 10, "b.wav": 20 });

  const result = classifyFolder(folder, { renameMaster: false });

  expect(result.masterDecision).toBe("largest");
  expect(result.master?.fileName).toBe("b.wav");
  expect(result.unidentified).toEqual(["a.wav"]);
  expect(fs.existsSync(path.join(folder, "b.wav"))).toBe(true);
});

test("a missing folder throws", () => {
  expect(() => classifyFolder(path.join(os.tmpdir(), "does-not-exist-classify"))).toThrow(/Session folder not found/);
});
