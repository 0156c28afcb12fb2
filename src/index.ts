import { createApp } from "./app";
import { getPort } from "./config";

const app = createApp();

const PORT = getPort();
app.listen(PORT, () => {
  console.log(`Office Supply Consolidator API running on port ${PORT}`);
});
