import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { JoseEncrypter, Vault, getGroundedError } from "../src";

async function main() {
  console.log("--- vaultfile basic usage ---");

  // 1. Open a vault in a scratch folder
  const root = await fs.mkdtemp(path.join(os.tmpdir(), "vaultfile-example-"));
  const vault = new Vault({
    root,
    encrypter: new JoseEncrypter({ secret: "example-secret" }),
    onError: (error) => console.warn(`vault: ${error.name}: ${getGroundedError(error)}`),
  });
  vault.onChange(({ name, removed }) => console.log(`changed: ${name}${removed ? " (removed)" : ""}`));

  // 2. Plain, external and secure keys
  const theme = vault.key.string("theme", { removable: true });
  const launches = vault.key.integer("launches");
  const notes = vault.key.list("notes", { useExternalStorage: true });
  const token = vault.secure.string("token");

  await theme.write("dark");
  await launches.update((count) => (count ?? 0) + 1);
  await notes.write(["buy milk", "call back"]);
  const tokenResult = await token.write("example-token");
  if (!tokenResult.success) {
    throw new Error(`Failed to store the token: ${tokenResult.error.message}`);
  }

  console.log("theme:", await theme.read());
  console.log("launches:", await launches.read());
  console.log("notes:", notes.readSync());
  console.log("token:", await token.read());
  console.log("keys:", (await vault.keys()).sort());

  // 3. Children are listed under their parent
  const profile = vault.key.map("profile");
  await profile.child("avatar").write({ url: "avatar.png" });
  console.log("profile sub-keys:", await profile.subKeys.list());

  // 4. Sweep removable values, then shut down
  console.log("removed:", await vault.clearRemovable());
  await vault.dispose();

  // 5. A second vault sees what the first one flushed
  const reopened = new Vault({ root, encrypter: new JoseEncrypter({ secret: "example-secret" }) });
  console.log("launches after reopen:", await reopened.key.integer("launches").read());
  await reopened.dispose();

  await fs.rm(root, { recursive: true, force: true });
}

main().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
