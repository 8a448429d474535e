const CRC_TABLE = (() => {
  const table = new Uint32Array(256);

  for (let n = 0; n < 256; n += 1) {
    let c = n;
    for (let k = 0; k < 8; k += 1) {
      c = c & 1 ? 0xedb88320 ^ (c >>> 1) : c >>> 1;
    }
    table[n] = c >>> 0;
  }

  return table;
})();

/** Continues a CRC-32 over `bytes`; pass the previous result to chain. */
export const updateCrc32 = (crc: number, bytes: Uint8Array): number => {
  let c = crc ^ 0xffffffff;

  for (let i = 0; i < bytes.length; i += 1) {
    c = CRC_TABLE[(c ^ bytes[i]) & 0xff] ^ (c >>> 8);
  }

  return (c ^ 0xffffffff) >>> 0;
};

export const crc32 = (...parts: Uint8Array[]): number =>
  parts.reduce((crc, part) => updateCrc32(crc, part), 0);
