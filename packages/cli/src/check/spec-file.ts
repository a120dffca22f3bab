import type { ErrorObject } from "ajv";
import Ajv2020 from "ajv/dist/2020.js";
import type { ContractSpec } from "@logbind/types";
import schema from "../../schemas/contract-spec.v1.schema.json" with { type: "json" };
import type { ContractSource } from "./types";

type ContractFile = ContractSpec | ContractSpec[];

const ajv = new Ajv2020({ strict: true, allErrors: true });
const validateContractFile = ajv.compile<ContractFile>(schema);

function describeErrors(errors: ErrorObject[] | null | undefined): string {
  return (errors ?? [])
    .map((error) => `  ${error.instancePath || "/"} ${error.message ?? "is invalid"}`)
    .join("\n");
}

/** Parses and validates a JSON contract file. Throws when the file is not a contract file. */
export function parseContractFile(text: string, source: string): ContractSource[] {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new Error(`Contract file "${source}" is not valid JSON: ${reason}`, { cause: error });
  }

  if (!validateContractFile(data)) {
    throw new Error(
      `Contract file "${source}" does not match the contract schema:\n${describeErrors(validateContractFile.errors)}`,
    );
  }

  const specs = Array.isArray(data) ? data : [data];
  return specs.map((spec) => ({ spec, source }));
}
