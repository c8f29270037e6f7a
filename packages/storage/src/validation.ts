import { z } from 'zod';

// web3.storage POST /upload
export const Web3StorageUploadSchema = z.object({
  cid: z.string().min(1),
});

// nft.storage POST /upload
export const NftStorageUploadSchema = z.object({
  ok: z.boolean().optional(),
  value: z.object({
    cid: z.string().min(1),
    size: z.number().optional(),
  }),
});

// Pinata POST /pinning/pinFileToIPFS
export const PinataPinSchema = z.object({
  IpfsHash: z.string().min(1),
  PinSize: z.number().optional(),
  Timestamp: z.string().optional(),
});
