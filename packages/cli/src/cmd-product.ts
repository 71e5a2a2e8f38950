/**
 * spm-edit add-product / add-product-target
 */
import type { ProductType } from "@spm-edit/core";
import { emitCliError, runEdit, type EditCommandOptions } from "./cmd-edit.js";

const PRODUCT_TYPES = new Map<string, ProductType>([
  ["library", { kind: "library", linkage: "automatic" }],
  ["static-library", { kind: "library", linkage: "static" }],
  ["dynamic-library", { kind: "library", linkage: "dynamic" }],
  ["executable", { kind: "executable" }],
]);

export async function runAddProduct(
  name: string,
  opts: EditCommandOptions & { type?: string; targets?: string[] }
): Promise<number> {
  const typeName = opts.type ?? "library";
  const type = PRODUCT_TYPES.get(typeName);
  if (!type) {
    emitCliError(
      "E_USAGE",
      `unknown product type '${typeName}', expected one of: ${[...PRODUCT_TYPES.keys()].join(", ")}`,
      !!opts.pretty
    );
    return 1;
  }
  return runEdit(opts, (editor) => editor.addProduct(name, type, opts.targets ?? []));
}

export async function runAddProductTarget(
  product: string,
  target: string,
  opts: EditCommandOptions
): Promise<number> {
  return runEdit(opts, (editor) => editor.addProductTarget(product, target));
}
