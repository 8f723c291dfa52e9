import type { ReceiptExtraction } from "../src/types";
import { receiptFromRecognition, scoreCandidates } from "../src/utils/nlp/receiptMatcher";
import { extractVoicePurchase } from "../src/utils/nlp/voiceItems";

const spokenAt = new Date("2026-03-14T12:00:00Z");

const purchase = extractVoicePurchase(
  "купил молоко, хлеб, сыр, яблоки и бананы, всего 60500",
  "ru",
  spokenAt
);

const receipts: ReceiptExtraction[] = [
  {
    id: "r1",
    userId: "user1",
    shopName: "Korzinka",
    total: 60500,
    timestamp: new Date("2026-03-14T12:03:00Z"),
    items: [
      { name: "Молоко 1л", unitPrice: 12000, quantity: 1, total: 12000 },
      { name: "Хлеб", unitPrice: 4500, quantity: 1, total: 4500 },
      { name: "Сыр", unitPrice: 44000, quantity: 1, total: 44000 },
    ],
  },
];

// An OCR result as a receipt recognizer would hand it over
const scanned = receiptFromRecognition(
  { ok: true, rawText: "MAKRO\nКофе 18000", items: [{ name: "Кофе", unitPrice: 18000, quantity: 1, total: 18000 }] },
  new Date("2026-03-14T11:58:00Z")
);
if (scanned) receipts.push({ id: "r2", userId: "user1", ...scanned });

const results = scoreCandidates({ id: "v1", userId: "user1", ...purchase }, receipts);
console.log(JSON.stringify({ purchase, results }, null, 2));
