import { QualifyChecker } from "./qualify-checker";

export default function QualifyPage() {
  return <QualifyChecker />;
}
