import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";

import {
  CALIBRATION_CONFIG_ENV,
  parseCalibrationFile,
  readCalibrationOffset,
  resolveCalibrationPath,
  writeCalibrationOffset,
} from "./calibration";

describe("Calibration config", () => {
  const originalOverride = process.env[CALIBRATION_CONFIG_ENV];
  let tempDir: string;

  beforeEach(() => {
    delete process.env[CALIBRATION_CONFIG_ENV];
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "deskpilot-calibration-"));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  afterAll(() => {
    if (originalOverride === undefined) {
      delete process.env[CALIBRATION_CONFIG_ENV];
    } else {
      process.env[CALIBRATION_CONFIG_ENV] = originalOverride;
    }
  });

  it("resolves the repository-level file without an override", () => {
    const expectedPath = path.resolve(
      __dirname,
      "../../../../config/calibration.json",
    );

    expect(resolveCalibrationPath()).toBe(expectedPath);
  });

  it("honours an explicit override", () => {
    const file = path.join(tempDir, "offset.json");
    fs.writeFileSync(file, '{"clickOffsetX": 3, "clickOffsetY": -2}');
    process.env[CALIBRATION_CONFIG_ENV] = file;

    expect(readCalibrationOffset()).toEqual({
      offset: { dx: 3, dy: -2 },
      path: file,
    });
  });

  it("rejects an override that does not exist", () => {
    process.env[CALIBRATION_CONFIG_ENV] = path.join(tempDir, "missing.json");

    expect(() => resolveCalibrationPath()).toThrow(
      /DESKPILOT_CALIBRATION_CONFIG points to/,
    );
  });

  it("rejects non-integer offsets", () => {
    expect(() =>
      parseCalibrationFile('{"clickOffsetX": 1.5, "clickOffsetY": 0}', "x.json"),
    ).toThrow("Calibration file x.json is invalid");
  });

  it("rejects malformed JSON", () => {
    expect(() => parseCalibrationFile("{", "x.json")).toThrow(
      "Calibration file x.json is not valid JSON",
    );
  });

  it("writes a file that reads back", () => {
    const file = path.join(tempDir, "nested", "calibration.json");

    const written = writeCalibrationOffset({ dx: 12.4, dy: -8 }, file);

    expect(written).toBe(file);
    expect(JSON.parse(fs.readFileSync(file, "utf8"))).toEqual({
      clickOffsetX: 12,
      clickOffsetY: -8,
    });
    expect(parseCalibrationFile(fs.readFileSync(file, "utf8"), file)).toEqual({
      dx: 12,
      dy: -8,
    });
  });
});
