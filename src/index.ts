// src/index.ts
import path from "path";
import { createApp } from "./app";
import { env } from "./config/env";
import { createTenderStore } from "./services/createTenderStore";
import { DocxDocumentWriter, loadEoiTemplate } from "./services/documentService";
import { createMailer } from "./services/mailer";
import { loadSampleTenders } from "./services/sampleData";
import { DefaultTenderService, type Session } from "./services/tenderService";
import { TenderSource } from "./services/tenderSource";

async function main() {
  const session: Session = {
    settings: {
      defaultRecipient: env.DEFAULT_RECIPIENT,
      bidEmail: env.BID_EMAIL,
      bidPhone: env.BID_PHONE,
      companyName: env.COMPANY_NAME,
    },
  };

  const tenders = new DefaultTenderService({
    store: createTenderStore(env),
    documents: new DocxDocumentWriter(path.resolve(env.DRAFTS_DIR)),
    mailer: createMailer(env),
    source: new TenderSource(env.TENDER_SOURCE_URL),
    session,
    template: loadEoiTemplate(),
  });

  if (env.SEED_SAMPLE_DATA) {
    const seeded = await tenders.seedIfEmpty(loadSampleTenders());
    if (!seeded.ok) {
      console.error("Seeding skipped:", seeded.error.message);
    } else if (seeded.data.seeded > 0) {
      console.log(`Seeded ${seeded.data.seeded} sample tenders`);
    }
  }

  const app = createApp({ tenders, session, jwtSecret: env.API_JWT_SECRET });

  app.listen(env.PORT, "0.0.0.0", () => {
    console.log(`Backend listening on port ${env.PORT}`);
  });
}

main().catch((err) => {
  console.error("Failed to start:", err);
  process.exit(1);
});
