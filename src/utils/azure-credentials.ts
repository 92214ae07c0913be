import { DefaultAzureCredential, TokenCredential } from "@azure/identity";

/**
 * Token credential for Azure services. Inside AKS this resolves to the
 * node pool's managed identity (or a user-assigned one when a client id
 * is given); locally it falls back to the Azure CLI login.
 */
export function createAzureCredential(
  managedIdentityClientId?: string,
): TokenCredential {
  return managedIdentityClientId
    ? new DefaultAzureCredential({ managedIdentityClientId })
    : new DefaultAzureCredential();
}
