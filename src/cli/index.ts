import { terminate } from "../domain/exit/resolver";
import { main } from "./main";

main(process.argv).catch(terminate);
