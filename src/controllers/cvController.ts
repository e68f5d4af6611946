import { Router } from "express";
import { tailorCvRequestSchema } from "../models/schemas";
import type { TextGenerator } from "../models/types";
import { renderTextPdfBase64 } from "../services/pdfService";
import { generateTailoredContent, loadDefaultCv } from "../services/tailorService";
import { type KeyPool, maskKey } from "../utils/keyPool";
import { withKeyRotation } from "../utils/retry";

export interface CvControllerDeps {
  keyPool: KeyPool;
  generateText: TextGenerator;
}

export const createCvController = ({ keyPool, generateText }: CvControllerDeps) => {
  const router = Router();

  router.post("/tailor-cv", async (req, res, next) => {
    try {
      const body = tailorCvRequestSchema.parse(req.body);
      const input = {
        title: body.title,
        company: body.company,
        description: body.description,
        cvTemplate: body.cv_template ?? loadDefaultCv(),
      };

      const { result, apiKey, attempt } = await withKeyRotation(
        keyPool,
        (key) => generateTailoredContent(generateText, key, input),
        { label: "TailorCV" },
      );

      const [cvPdf, coverLetterPdf] = await Promise.all([
        renderTextPdfBase64(result.cvText, `CV_${body.title}`),
        renderTextPdfBase64(result.coverLetterText, `CoverLetter_${body.title}`),
      ]);

      console.log(`[CvController] Tailored CV for "${body.title}" on attempt ${attempt}`);

      res.json({
        success: true,
        cv_pdf: cvPdf,
        cover_letter_pdf: coverLetterPdf,
        cv_text: result.cvText,
        cover_letter_text: result.coverLetterText,
        job_title: body.title,
        company: body.company,
        url: body.url ?? null,
        api_key_used: maskKey(apiKey),
        attempt,
        message: "CV and Cover Letter PDFs generated successfully",
      });
    } catch (error) {
      next(error);
    }
  });

  return router;
};
