import { isLanguage } from "../src/types";
import { compileCommandTable } from "../src/utils/nlp/commandTable";
import { IntentClassifier } from "../src/utils/nlp/intentClassifier";
import { detectLanguage } from "../src/utils/nlp/textNormalizer";

const samples = process.argv.slice(2).length
  ? process.argv.slice(2)
  : [
      "потратил 5000 сум на хлеб",
      "создай цель машина 5000 долларов",
      "xarajat 20 ming so'm non uchun",
      "show balance",
    ];

const forced = process.env.LANG_HINT;
const classifier = new IntentClassifier(compileCommandTable());

for (const text of samples) {
  const language = isLanguage(forced) ? forced : detectLanguage(text);
  const outcome = classifier.classify(
    { text, language, timestamp: new Date(), modality: "text" },
    { baseCurrency: "UZS" }
  );
  console.log(JSON.stringify({ text, language, outcome }, null, 2));
}
