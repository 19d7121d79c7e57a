/**
 * 依序釋放資源，單一資源釋放失敗不影響其他資源。
 * 全部處理完後若有錯誤，拋出第一個。
 */
export async function dispose(...targets: AsyncDisposable[]): Promise<void> {
  const errors: unknown[] = [];
  for (const target of targets) {
    try {
      await target[Symbol.asyncDispose]();
    } catch (error) {
      errors.push(error);
    }
  }
  if (errors.length > 0) throw errors[0];
}
