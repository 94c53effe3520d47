import { describe, expect, it } from "vitest";
import sharp from "sharp";
import { prepareImage } from "./image.js";

const photo = (width: number, height: number, channels: 3 | 4 = 3) =>
  sharp({
    create: {
      width,
      height,
      channels,
      background: { r: 40, g: 120, b: 200, alpha: 0.5 },
    },
  })
    .png()
    .toBuffer();

describe("prepareImage", () => {
  it("fits a large photo inside 1024x1024", async () => {
    const prepared = await prepareImage(await photo(1500, 3000));
    const metadata = await sharp(prepared.data).metadata();

    expect(prepared.mediaType).toBe("image/jpeg");
    expect([metadata.width, metadata.height]).toEqual([512, 1024]);
  });

  it("never enlarges a small photo", async () => {
    const prepared = await prepareImage(await photo(300, 200));
    const metadata = await sharp(prepared.data).metadata();
    expect([metadata.width, metadata.height]).toEqual([300, 200]);
  });

  it("drops transparency", async () => {
    const prepared = await prepareImage(await photo(64, 64, 4));
    const metadata = await sharp(prepared.data).metadata();

    expect(metadata.format).toBe("jpeg");
    expect(metadata.channels).toBe(3);
    expect(metadata.hasAlpha).toBe(false);
  });

  it("rejects bytes that are not an image", async () => {
    await expect(prepareImage(Buffer.from("not a photo"))).rejects.toThrow();
  });
});
