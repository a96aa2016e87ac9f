import type { Request, Response } from "express";
import Joi from "joi";
import conversionService, {
  CONVERSION_SOURCE_EXTENSIONS,
  resolveConversionType,
} from "../services/conversion.service";
import { getUploadedFile, readUpload } from "../middleware/upload.middleware";
import type { UploadPolicy } from "../middleware/upload.middleware";
import { ValidationError } from "../utils/errors";
import { sendError, sendResult } from "../utils/response";
import { validateFields } from "../utils/validation";

export const CONVERT_POLICY: UploadPolicy = {
  field: "file",
  maxCount: 1,
  extensions: CONVERSION_SOURCE_EXTENSIONS,
  context: "convert",
};

const convertSchema = Joi.object<{ conversion_type: string }>({
  conversion_type: Joi.string().trim().max(50).allow("").default(""),
});

export async function convert(req: Request, res: Response): Promise<void> {
  try {
    const file = getUploadedFile(req);
    const { conversion_type } = validateFields(convertSchema, req.body);

    const type = resolveConversionType(conversion_type);
    if (!type) {
      throw new ValidationError("Invalid conversion type selected.");
    }

    const result = await conversionService.convert(type, await readUpload(file));
    await sendResult(req, res, result);
  } catch (error) {
    await sendError(req, res, error, "convert");
  }
}
