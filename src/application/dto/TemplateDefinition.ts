import { z } from 'zod';

/** 單一 template 定義：純 pattern 字串，或帶 base 的物件 */
export const TemplateDefinitionSchema = z.union([
  z.string(),
  z.object({
    pattern: z.string(),
    base: z.string().optional(),
  }).strict(),
]);

/** JS 物件會把整數形式的鍵排到最前面，這類名稱無法保留書寫順序 */
const INTEGER_KEY = /^(0|[1-9]\d*)$/;

/** 批次定義：name → 定義，依物件鍵順序註冊 */
export const TemplateDefinitionsSchema = z
  .record(z.string(), TemplateDefinitionSchema)
  .superRefine((definitions, ctx) => {
    for (const name of Object.keys(definitions)) {
      if (INTEGER_KEY.test(name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [name],
          message: 'template names must not be integers: object keys of that form lose their declared order',
        });
      }
    }
  });

export type TemplateDefinition = z.infer<typeof TemplateDefinitionSchema>;
export type TemplateDefinitions = z.infer<typeof TemplateDefinitionsSchema>;

/** 將 zod issue 轉成 `path: message` 字串 */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${where}: ${issue.message}`;
  });
}
